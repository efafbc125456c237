import {randomInt} from 'node:crypto';

/**
 * 乱数源
 *
 * 口座番号の採番などで使う。プロセス全体で共有される乱数生成器ではなく、
 * 必要とするクラスへ明示的に注入する。
 */
export interface RandomSource {
    /**
     * 0 以上 maxExclusive 未満の一様な整数を返す
     */
    nextInt(maxExclusive: number): number;
}

/**
 * DI用のシンボル
 */
export const RandomSourceToken = Symbol('RandomSource');

/**
 * node:crypto の乱数を使う実装（本番用）
 */
export class CryptoRandomSource implements RandomSource {
    nextInt(maxExclusive: number): number {
        return randomInt(maxExclusive);
    }
}

/**
 * シード付きの決定的な実装（テスト・再現用）
 *
 * mulberry32 アルゴリズム。同じシードからは常に同じ列が得られる。
 */
export class SeededRandomSource implements RandomSource {
    private state: number;

    constructor(seed: number) {
        this.state = seed >>> 0;
    }

    nextInt(maxExclusive: number): number {
        return Math.floor(this.nextFloat() * maxExclusive);
    }

    private nextFloat(): number {
        this.state = (this.state + 0x6d2b79f5) >>> 0;
        let t = this.state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }
}
