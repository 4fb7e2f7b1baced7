/**
 * 解码文档容器的能力约束
 * EN: Capability contract for decoded document containers
 */

import type { BSONValue } from './types';
import { CodecError } from '../core/codecError';

/**
 * 有序、可变、键唯一的映射容器
 * EN: Ordered, mutable, key-unique mapping container
 */
export interface MutableMapping<V = BSONValue> extends Iterable<[string, V]> {
    get(key: string): V | undefined;
    set(key: string, value: V): this;
    delete(key: string): boolean;
    has(key: string): boolean;
    keys(): Iterable<string>;
}

/**
 * 可实例化为 MutableMapping 的类
 * EN: A class that instantiates a MutableMapping
 */
export type DocumentClass<V = BSONValue> = new () => MutableMapping<V>;

/** 默认文档容器 EN: Default document container */
export const DEFAULT_DOCUMENT_CLASS: DocumentClass = Map;

const REQUIRED_METHODS: readonly (string | symbol)[] = [
    'get',
    'set',
    'delete',
    'has',
    'keys',
    Symbol.iterator,
];

/** 已注册容器类的原型 EN: Prototypes of registered container classes */
const registeredPrototypes = new WeakSet<object>();

function prototypeOf(value: unknown): object | null {
    if (typeof value !== 'function') {
        return null;
    }
    const proto: unknown = value.prototype;
    return typeof proto === 'object' && proto !== null ? proto : null;
}

/**
 * 将自定义类注册为 MutableMapping，其子类同样视为已注册
 * 类必须在原型链上提供 get/set/delete/has/keys 与迭代器
 * EN: Register a custom class as a MutableMapping, its subclasses count as registered too
 * EN: The class must provide get/set/delete/has/keys and an iterator on its prototype chain
 */
export function registerMutableMapping(cls: DocumentClass): void {
    const proto = prototypeOf(cls);
    const complete =
        proto !== null && REQUIRED_METHODS.every((name) => typeof Reflect.get(proto, name) === 'function');
    if (proto === null || !complete) {
        throw CodecError.typeMismatch(
            'only classes implementing the MutableMapping methods can be registered'
        );
    }
    registeredPrototypes.add(proto);
}

/**
 * 检查值是否为 Map、Map 的子类或已注册的类（及其子类）
 * 按原型链判断，只有同名方法不足以通过
 * EN: Check whether a value is Map, a subclass of Map, or a registered class (or its subclass)
 * EN: Decided by the prototype chain, methods with matching names are not enough
 */
export function isMutableMappingClass(value: unknown): value is DocumentClass {
    for (let proto = prototypeOf(value); proto !== null; proto = Object.getPrototypeOf(proto)) {
        if (proto === Map.prototype || registeredPrototypes.has(proto)) {
            return true;
        }
    }
    return false;
}
