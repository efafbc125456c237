import {randomUUID} from 'node:crypto';

/**
 * 一意なID（取引IDなど）を発行する
 */
export interface IdGenerator {
    nextId(): string;
}

/**
 * DI用のシンボル
 */
export const IdGeneratorToken = Symbol('IdGenerator');

export class UuidGenerator implements IdGenerator {
    nextId(): string {
        return randomUUID();
    }
}
