import {z} from 'zod';
import {ACCOUNT_NUMBER_LENGTH} from '../../domain/model/AccountNumber';
import {Money} from '../../domain/model/Money';

/**
 * 必須の文字列（空文字を拒否）
 */
export function requiredString(message: string) {
    return z.string().min(1, {message});
}

/**
 * 口座番号: 空でないこと → 11文字であること、の順に検証する
 *
 * @param label メッセージの主語（"Account number", "Sender account number" など）
 */
export function accountNumberSchema(label = 'Account number') {
    return z
        .string()
        .min(1, {message: `${label} cannot be null or empty`})
        .length(ACCOUNT_NUMBER_LENGTH, {
            message: `${label} must be ${String(ACCOUNT_NUMBER_LENGTH)} digits long`,
        });
}

/**
 * 正の金額
 */
export const positiveMoneySchema = z
    .custom<Money>((val) => val instanceof Money, {
        message: 'amount must be a Money instance',
    })
    .refine((money) => money.isPositive(), {
        message: 'Amount must be positive',
    });
