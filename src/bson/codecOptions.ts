/**
 * BSON 编解码选项
 * EN: BSON codec options
 */

import { CodecError } from '../core/codecError';
import { LogLevel, logger } from '../core/logger';
import {
    DEFAULT_UUID_REPRESENTATION,
    type UuidRepresentationType,
    isUuidRepresentation,
    uuidRepresentationName,
} from './binary';
import { DEFAULT_DOCUMENT_CLASS, type DocumentClass, isMutableMappingClass } from './mapping';

const log = logger.child('codecOptions');

/**
 * 可替换的字段
 * EN: Fields that can be replaced
 */
export interface CodecOptionsOverrides {
    documentClass?: unknown;
    tzAware?: unknown;
    uuidRepresentation?: unknown;
}

/**
 * 编解码选项（不可变）
 * 解码文档的容器类、日期时间是否带时区、UUID 的表示方式
 * EN: Codec options (immutable)
 * EN: Container class for decoded documents, timezone awareness of datetimes, UUID representation
 *
 * 参数在构造时校验，校验失败不会产生实例
 * EN: Arguments are validated at construction, a failed check produces no instance
 */
export class CodecOptions {
    private readonly _documentClass: DocumentClass;
    private readonly _tzAware: boolean;
    private readonly _uuidRepresentation: UuidRepresentationType;

    constructor(
        documentClass: unknown = DEFAULT_DOCUMENT_CLASS,
        tzAware: unknown = false,
        uuidRepresentation: unknown = DEFAULT_UUID_REPRESENTATION
    ) {
        if (!isMutableMappingClass(documentClass)) {
            throw CodecError.typeMismatch(
                'documentClass must be Map, a subclass of Map, or a registered MutableMapping class'
            );
        }
        if (typeof tzAware !== 'boolean') {
            throw CodecError.typeMismatch('tzAware must be a boolean');
        }
        if (!isUuidRepresentation(uuidRepresentation)) {
            throw CodecError.badValue(
                'uuidRepresentation must be a value from ALL_UUID_REPRESENTATIONS'
            );
        }

        this._documentClass = documentClass;
        this._tzAware = tzAware;
        this._uuidRepresentation = uuidRepresentation;
        Object.freeze(this);
    }

    /** 解码文档的容器类 EN: Container class for decoded documents */
    get documentClass(): DocumentClass {
        return this._documentClass;
    }

    /** 解码的日期时间是否带 UTC 时区 EN: Whether decoded datetimes carry UTC */
    get tzAware(): boolean {
        return this._tzAware;
    }

    /** UUID 表示方式 EN: UUID representation */
    get uuidRepresentation(): UuidRepresentationType {
        return this._uuidRepresentation;
    }

    /**
     * 逐字段比较，容器类按引用比较
     * 与非 CodecOptions 值比较属于调用方错误，抛出而不是返回 false
     * EN: Field-wise comparison, container class by reference
     * EN: Comparing with a non-CodecOptions value is a caller error and throws instead of returning false
     */
    equals(other: unknown): boolean {
        if (!(other instanceof CodecOptions)) {
            throw CodecError.illegalOperation('CodecOptions can only be compared with CodecOptions');
        }
        return (
            this._documentClass === other.documentClass &&
            this._tzAware === other.tzAware &&
            this._uuidRepresentation === other.uuidRepresentation
        );
    }

    notEquals(other: unknown): boolean {
        return !this.equals(other);
    }

    /**
     * 返回替换了部分字段的新实例，原实例不变
     * EN: Return a new instance with some fields replaced, the receiver is unchanged
     */
    withOptions(overrides: CodecOptionsOverrides): CodecOptions {
        return new CodecOptions(
            overrides.documentClass === undefined ? this._documentClass : overrides.documentClass,
            overrides.tzAware === undefined ? this._tzAware : overrides.tzAware,
            overrides.uuidRepresentation === undefined
                ? this._uuidRepresentation
                : overrides.uuidRepresentation
        );
    }

    toString(): string {
        const className = this._documentClass.name || '<anonymous>';
        return (
            `CodecOptions(documentClass=${className}, ` +
            `tzAware=${this._tzAware}, ` +
            `uuidRepresentation=${uuidRepresentationName(this._uuidRepresentation)})`
        );
    }
}

/** 默认编解码选项 EN: Default codec options */
export const DEFAULT_CODEC_OPTIONS = new CodecOptions();

/** 选项包中识别的键 EN: Keys recognized in an option bag */
export const CODEC_OPTION_KEYS = ['document_class', 'tz_aware', 'uuidrepresentation'] as const;

/**
 * 从驱动层的松散选项包解析编解码选项
 * 缺失的键使用默认值，其余键被忽略；选项包本身必须是普通对象
 * EN: Parse codec options from a loose driver-level option bag
 * EN: Missing keys take their defaults, all other keys are ignored; the bag itself must be a plain object
 */
export function parseCodecOptions(options: Record<string, unknown>): CodecOptions {
    if (typeof options !== 'object' || options === null || Array.isArray(options)) {
        throw CodecError.invalidOptions('codec options must be a plain object');
    }

    if (log.isEnabled(LogLevel.Debug)) {
        const recognized: readonly string[] = CODEC_OPTION_KEYS;
        const ignored = Object.keys(options).filter((key) => !recognized.includes(key));
        if (ignored.length > 0) {
            log.debug('ignoring unrecognized codec option keys', { keys: ignored });
        }
    }

    return new CodecOptions(
        options['document_class'],
        options['tz_aware'],
        options['uuidrepresentation']
    );
}
