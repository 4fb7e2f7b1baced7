/**
 * UUID 表示方式
 * EN: UUID representations
 */

import { Binary } from './types';
import { CodecError } from '../core/codecError';

/**
 * UUID 编解码时使用的字节布局约定
 * EN: Byte-layout conventions used when encoding and decoding UUIDs
 */
export const UuidRepresentation = {
    /** RFC 4122 字节序，子类型 4 EN: RFC 4122 byte order, subtype 4 */
    STANDARD: 4,
    /** 旧版 Python 驱动，子类型 3 EN: Legacy Python driver, subtype 3 */
    PYTHON_LEGACY: 3,
    /** 旧版 Java 驱动，子类型 3 EN: Legacy Java driver, subtype 3 */
    JAVA_LEGACY: 5,
    /** 旧版 C# 驱动，子类型 3 EN: Legacy C# driver, subtype 3 */
    CSHARP_LEGACY: 6,
} as const;

export type UuidRepresentationType = typeof UuidRepresentation[keyof typeof UuidRepresentation];

export type UuidRepresentationName = keyof typeof UuidRepresentation;

export const ALL_UUID_REPRESENTATIONS: readonly UuidRepresentationType[] = Object.freeze([
    UuidRepresentation.STANDARD,
    UuidRepresentation.PYTHON_LEGACY,
    UuidRepresentation.JAVA_LEGACY,
    UuidRepresentation.CSHARP_LEGACY,
]);

/** 默认（旧版）表示方式 EN: Default (legacy) representation */
export const DEFAULT_UUID_REPRESENTATION: UuidRepresentationType = UuidRepresentation.PYTHON_LEGACY;

const representationNames: Map<UuidRepresentationType, UuidRepresentationName> = new Map([
    [UuidRepresentation.STANDARD, 'STANDARD'],
    [UuidRepresentation.PYTHON_LEGACY, 'PYTHON_LEGACY'],
    [UuidRepresentation.JAVA_LEGACY, 'JAVA_LEGACY'],
    [UuidRepresentation.CSHARP_LEGACY, 'CSHARP_LEGACY'],
]);

/**
 * 检查值是否为已知的 UUID 表示方式
 * EN: Check whether a value is a known UUID representation
 */
export function isUuidRepresentation(value: unknown): value is UuidRepresentationType {
    return typeof value === 'number' && ALL_UUID_REPRESENTATIONS.some((rep) => rep === value);
}

export function uuidRepresentationName(rep: UuidRepresentationType): UuidRepresentationName {
    const name = representationNames.get(rep);
    if (name === undefined) {
        throw CodecError.badValue(`unknown uuid representation: ${rep}`);
    }
    return name;
}

/**
 * 获取表示方式对应的二进制子类型
 * 只有 STANDARD 使用子类型 4，所有旧版表示方式都写为子类型 3
 * EN: Get the binary subtype a representation is written with
 * EN: Only STANDARD uses subtype 4, every legacy representation is written as subtype 3
 */
export function uuidBinarySubtype(rep: UuidRepresentationType): number {
    return rep === UuidRepresentation.STANDARD ? Binary.SUBTYPE_UUID : Binary.SUBTYPE_UUID_OLD;
}
