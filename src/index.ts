/**
 * bson-codec-options - BSON 编解码选项
 * EN: bson-codec-options - BSON codec options
 */

// BSON 层
// EN: BSON layer
export * from './bson';

// 核心层
// EN: Core layer
export { ErrorCode, getErrorCodeName, CodecError, LogLevel, ConsoleLogger, logger } from './core';
export type { LogContext } from './core';
