export type * from './pdf.js';
export type * from './fonts.js';
export type * from './layout.js';
export type * from './translation.js';
export type * from './output.js';
export type * from './config.js';
