/**
 * 从官方 MongoDB bson 库重新导出类型
 * EN: Re-export types from official MongoDB bson library
 */

import {
    type ObjectId as OfficialObjectId,
    type Timestamp as OfficialTimestamp,
    type Decimal128 as OfficialDecimal128,
    type MinKey as OfficialMinKey,
    type MaxKey as OfficialMaxKey,
    Binary as OfficialBinary,
    type BSONRegExp as OfficialBSONRegExp,
    type Code as OfficialCode,
    type DBRef as OfficialDBRef,
    type Long as OfficialLong,
} from 'bson';

export const Binary = OfficialBinary;
export type Binary = OfficialBinary;

/**
 * BSON 值联合类型
 * EN: BSON value union type
 */
export type BSONValue =
    | null
    | undefined
    | boolean
    | number
    | bigint
    | string
    | Date
    | Buffer
    | OfficialObjectId
    | OfficialTimestamp
    | OfficialDecimal128
    | OfficialMinKey
    | OfficialMaxKey
    | OfficialBinary
    | OfficialBSONRegExp
    | OfficialCode
    | OfficialDBRef
    | OfficialLong
    | BSONValue[]
    | BSONDocument;

/**
 * BSON 文档类型
 * EN: BSON document type
 */
export interface BSONDocument {
    [key: string]: BSONValue;
}
