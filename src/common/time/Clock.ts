/**
 * 現在時刻の取得を抽象化する
 * テストでは固定時刻を返す実装に差し替える
 */
export interface Clock {
    now(): Date;
}

/**
 * DI用のシンボル
 */
export const ClockToken = Symbol('Clock');

export class SystemClock implements Clock {
    now(): Date {
        return new Date();
    }
}
