// Barrel-файл модуля сессии.
export { DatasetSession, EmptySessionError, searchDataset } from './session.js';
export type { SessionSearchResult } from './session.js';

export { runMenu } from './menu.js';
export type { MenuAction, MenuPrompts, MenuOptions } from './menu.js';
