import type {LosslessNumber} from 'lossless-json';
import {z} from 'zod';
import type {TransactionType} from '../../../../application/domain/model/Transaction';
import {JsonDecimalSchema, JsonNumberSchema} from './JsonNumber';

/**
 * 取引種別の序数表現
 * 古いスナップショットでは Type が数値（0, 1, 2）で書かれている
 */
export const TRANSACTION_TYPE_ORDINALS: readonly TransactionType[] = ['Deposit', 'Withdrawal', 'Transfer'];

/**
 * 取引ファイル（transactions.json）の1レコード（読み込み用）
 *
 * RecipientAccountId は null または省略を許す。
 */
export const TransactionRecordSchema = z.object({
    TransactionId: z.string(),
    AccountId: z.string(),
    Type: z.union([
        z.enum(['Deposit', 'Withdrawal', 'Transfer']),
        JsonNumberSchema.transform((value) => Number(value.toString())).pipe(
            z.number().int().min(0).max(TRANSACTION_TYPE_ORDINALS.length - 1)
        ),
    ]),
    Amount: JsonDecimalSchema,
    Timestamp: z.string(),
    RecipientAccountId: z.string().nullable().optional(),
});

export type PersistedTransactionRecord = z.infer<typeof TransactionRecordSchema>;

export const TransactionRecordListSchema = z.array(TransactionRecordSchema);

/**
 * 書き出し用のレコード
 * Type は常に文字列、RecipientAccountId は常に出力する（無ければ null）
 */
export interface TransactionRecord {
    TransactionId: string;
    AccountId: string;
    Type: TransactionType;
    Amount: LosslessNumber;
    Timestamp: string;
    RecipientAccountId: string | null;
}
