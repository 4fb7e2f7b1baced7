import { ErrorCode, getErrorCodeName } from './errorCodes';

/**
 * 编解码选项错误，错误码与 MongoDB 对齐
 * EN: Codec options error, codes aligned with MongoDB
 */
export class CodecError extends Error {
    readonly code: ErrorCode;
    readonly codeName: string;

    constructor(code: ErrorCode, message: string) {
        super(message);
        this.name = 'CodecError';
        this.code = code;
        this.codeName = getErrorCodeName(code);
    }

    toString(): string {
        return `${this.codeName} (${this.code}): ${this.message}`;
    }

    /**
     * 值不在允许的集合中
     * EN: Value is not a member of the allowed set
     */
    static badValue(message: string): CodecError {
        return new CodecError(ErrorCode.BadValue, message);
    }

    static typeMismatch(message: string): CodecError {
        return new CodecError(ErrorCode.TypeMismatch, message);
    }

    /**
     * 调用方违反约定
     * EN: Caller broke a contract
     */
    static illegalOperation(message: string): CodecError {
        return new CodecError(ErrorCode.IllegalOperation, message);
    }

    static invalidOptions(message: string): CodecError {
        return new CodecError(ErrorCode.InvalidOptions, message);
    }
}
