import {InvalidArgumentException} from '../exception/InvalidArgumentException';

/**
 * お金を表す値オブジェクト
 * 不変（immutable）で、固定小数点の10進数として金額を扱う
 *
 * 【内部表現】
 * 小数第28位を1とする bigint で保持する。
 * 1000.50 → 100050n * 10n ** 26n
 *
 * 浮動小数点演算は一切行わないため、加減算で丸め誤差は発生しない。
 * 表示（toString）だけは小数第2位に丸める。
 */
export class Money {
    /**
     * 保持できる小数部の最大桁数
     */
    public static readonly MAX_SCALE = 28;

    /**
     * 表示する小数部の桁数
     */
    public static readonly DISPLAY_SCALE = 2;

    private static readonly UNITS_PER_MAJOR = 10n ** BigInt(Money.MAX_SCALE);

    private static readonly DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d+))?(?:[eE]([+-]?\d+))?$/;

    public static readonly ZERO = new Money(0n);

    private constructor(private readonly units: bigint) {}

    /**
     * 10進数の金額（主単位）から Money を生成
     *
     * 【使用例】
     * ```typescript
     * Money.of(1000.5)      // 1000.50
     * Money.of('300.75')    // 300.75
     * Money.of('0.005')     // 0.005
     * Money.of('1e+21')     // 1000000000000000000000
     * Money.of(10n)         // 10.00
     * ```
     *
     * 小数第29位以降を持つ値、有限でない数値、10進表記でない文字列は拒否する。
     */
    static of(value: number | bigint | string): Money {
        if (typeof value === 'bigint') {
            return new Money(value * Money.UNITS_PER_MAJOR);
        }

        if (typeof value === 'number' && !Number.isFinite(value)) {
            throw new InvalidArgumentException(`Amount must be a finite number: ${String(value)}`);
        }

        return Money.parse(String(value).trim());
    }

    private static parse(text: string): Money {
        const match = Money.DECIMAL_PATTERN.exec(text);
        if (!match) {
            throw new InvalidArgumentException(`Amount is not a valid decimal number: ${text}`);
        }

        const [, sign, whole, fraction = '', exponent = '0'] = match;
        let coefficient = BigInt(whole + fraction);
        let scale = fraction.length - Number(exponent);

        if (scale < 0) {
            coefficient *= 10n ** BigInt(-scale);
            scale = 0;
        }
        while (scale > Money.MAX_SCALE && coefficient % 10n === 0n) {
            coefficient /= 10n;
            scale -= 1;
        }
        if (scale > Money.MAX_SCALE) {
            throw new InvalidArgumentException(
                `Amount must not have more than ${String(Money.MAX_SCALE)} decimal places: ${text}`
            );
        }

        const units = coefficient * 10n ** BigInt(Money.MAX_SCALE - scale);
        return new Money(sign ? -units : units);
    }

    /**
     * 金額が正の値かどうか
     */
    isPositive(): boolean {
        return this.units > 0n;
    }

    /**
     * 金額が負の値かどうか
     */
    isNegative(): boolean {
        return this.units < 0n;
    }

    isZero(): boolean {
        return this.units === 0n;
    }

    /**
     * 他のMoneyより大きいかどうか
     */
    isGreaterThan(other: Money): boolean {
        return this.units > other.units;
    }

    /**
     * 他のMoney以上かどうか
     */
    isGreaterThanOrEqualTo(other: Money): boolean {
        return this.units >= other.units;
    }

    /**
     * このMoneyに別のMoneyを加算
     */
    plus(other: Money): Money {
        return new Money(this.units + other.units);
    }

    /**
     * このMoneyから別のMoneyを減算
     */
    minus(other: Money): Money {
        return new Money(this.units - other.units);
    }

    /**
     * 等価性チェック
     */
    equals(other: Money): boolean {
        return this.units === other.units;
    }

    /**
     * 表示用の文字列（小数第2位に四捨五入）
     *
     * 【例】
     * Money.of(699.75).toString()   // "699.75"
     * Money.of(1000.5).toString()   // "1000.50"
     * Money.of('0.005').toString()  // "0.01"
     * Money.of(-3).toString()       // "-3.00"
     */
    toString(): string {
        const step = 10n ** BigInt(Money.MAX_SCALE - Money.DISPLAY_SCALE);
        const absolute = this.units < 0n ? -this.units : this.units;
        let rounded = absolute / step;
        if ((absolute % step) * 2n >= step) {
            rounded += 1n;
        }

        const perMajor = 10n ** BigInt(Money.DISPLAY_SCALE);
        const whole = rounded / perMajor;
        const fraction = (rounded % perMajor).toString().padStart(Money.DISPLAY_SCALE, '0');
        const sign = this.units < 0n && rounded > 0n ? '-' : '';

        return `${sign}${whole.toString()}.${fraction}`;
    }

    /**
     * 値を失わない10進表記（末尾の0は付けない）
     *
     * 保存ファイルには、この文字列をそのまま JSON の数値として書く。
     * Money.of(money.toDecimalString()) は常に元の値に戻る。
     *
     * 【例】
     * Money.of('1000.50').toDecimalString()  // "1000.5"
     * Money.ZERO.toDecimalString()           // "0"
     */
    toDecimalString(): string {
        const absolute = this.units < 0n ? -this.units : this.units;
        const whole = (absolute / Money.UNITS_PER_MAJOR).toString();
        const fraction = (absolute % Money.UNITS_PER_MAJOR)
            .toString()
            .padStart(Money.MAX_SCALE, '0')
            .replace(/0+$/, '');
        const sign = this.units < 0n ? '-' : '';

        return fraction ? `${sign}${whole}.${fraction}` : `${sign}${whole}`;
    }
}
