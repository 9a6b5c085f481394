export * from './types';
export * from './errors';
export * from './schema';
export * from './pipeline';
export * from './workbook';
