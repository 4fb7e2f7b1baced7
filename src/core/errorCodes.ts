/**
 * 与 MongoDB 服务端对齐的错误码
 * EN: Error codes aligned with the MongoDB server
 * 参考: https://github.com/mongodb/mongo/blob/master/src/mongo/base/error_codes.yml
 * EN: Reference: https://github.com/mongodb/mongo/blob/master/src/mongo/base/error_codes.yml
 */
export enum ErrorCode {
    /** 值不在允许的集合中 EN: Bad value */
    BadValue = 2,
    /** 类型不匹配 EN: Type mismatch */
    TypeMismatch = 14,
    /** 非法操作 EN: Illegal operation */
    IllegalOperation = 20,
    /** 无效选项 EN: Invalid options */
    InvalidOptions = 72,
}

export const errorCodeNames: Map<ErrorCode, string> = new Map([
    [ErrorCode.BadValue, 'BadValue'],
    [ErrorCode.TypeMismatch, 'TypeMismatch'],
    [ErrorCode.IllegalOperation, 'IllegalOperation'],
    [ErrorCode.InvalidOptions, 'InvalidOptions'],
]);

export function getErrorCodeName(code: ErrorCode): string {
    return errorCodeNames.get(code) ?? 'UnknownError';
}
