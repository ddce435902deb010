/**
 * FTP/FTPS storage provider
 */

export * from './types';
export * from './utils';
export * from './clients';
export * from './core';
