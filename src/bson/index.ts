/**
 * BSON 模块导出
 * EN: BSON module exports
 */

export * from './types';
export * from './binary';
export * from './mapping';
export * from './codecOptions';
