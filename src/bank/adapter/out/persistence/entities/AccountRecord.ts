import type {LosslessNumber} from 'lossless-json';
import {z} from 'zod';
import {JsonDecimalSchema} from './JsonNumber';

/**
 * 口座ファイル（accounts.json）の1レコード（読み込み用）
 *
 * ```json
 * {
 *   "Name": "John Doe",
 *   "AccountNumber": "12345678901",
 *   "Pin": "1234",
 *   "Balance": 699.75
 * }
 * ```
 */
export const AccountRecordSchema = z.object({
    Name: z.string(),
    AccountNumber: z.string(),
    Pin: z.string(),
    Balance: JsonDecimalSchema,
});

export const AccountRecordListSchema = z.array(AccountRecordSchema);

/**
 * 書き出し用のレコード
 */
export interface AccountRecord {
    Name: string;
    AccountNumber: string;
    Pin: string;
    Balance: LosslessNumber;
}
