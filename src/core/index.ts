/**
 * Core 模块导出
 * EN: Core module exports
 */

export * from './errorCodes';
export * from './codecError';
export * from './logger';
