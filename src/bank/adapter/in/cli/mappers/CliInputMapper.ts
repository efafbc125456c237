import {BankingException} from '../../../../application/domain/exception/BankingException';
import {Money} from '../../../../application/domain/model/Money';

/**
 * 入力された金額文字列を Money に変換する
 *
 * 【例】
 * parseAmount('1000.50')  // Money(1000.50)
 * parseAmount(' 20 ')     // Money(20.00)
 * parseAmount('0')        // null（正でない）
 * parseAmount('abc')      // null
 * parseAmount('0.005')    // Money(0.005)（表示は $0.01）
 *
 * @returns 正の金額。数値として読めない、または0以下なら null
 */
export function parseAmount(input: string | null): Money | null {
    if (input === null) {
        return null;
    }

    try {
        const amount = Money.of(input);
        return amount.isPositive() ? amount : null;
    } catch (error) {
        if (error instanceof BankingException) {
            return null;
        }
        throw error;
    }
}

/**
 * 画面表示用の金額（"$1000.50"、小数第2位に四捨五入）
 */
export function formatMoney(money: Money): string {
    return `$${money.toString()}`;
}

/**
 * 例外を画面に出すメッセージにする
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
