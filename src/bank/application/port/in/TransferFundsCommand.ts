import {z} from 'zod';
import type {Money} from '../../domain/model/Money';
import {accountNumberSchema, positiveMoneySchema, requiredString} from './CommandSchemas';
import {validateCommand} from './CommandValidation';

/**
 * 送金コマンドのバリデーションスキーマ
 *
 * 【検証順】
 * 送金元口座番号 → 送金元PIN → 送金先口座番号 → 同一口座でないこと → 金額
 *
 * 同一口座チェックは parties オブジェクトの refine に置き、
 * 金額より先に報告されるようにしている。
 */
const TransferFundsCommandSchema = z.object({
    parties: z
        .object({
            senderAccountNumber: accountNumberSchema('Sender account number'),
            senderPin: requiredString('Sender PIN cannot be null or empty'),
            receiverAccountNumber: accountNumberSchema('Receiver account number'),
        })
        .refine((p) => p.senderAccountNumber !== p.receiverAccountNumber, {
            message: 'Sender and receiver account numbers must be different',
        }),
    amount: positiveMoneySchema,
});

/**
 * 送金コマンド
 * 不変オブジェクトとして実装
 */
export class TransferFundsCommand {
    constructor(
        public readonly senderAccountNumber: string,
        public readonly senderPin: string,
        public readonly receiverAccountNumber: string,
        public readonly amount: Money
    ) {
        validateCommand(TransferFundsCommandSchema, {
            parties: {senderAccountNumber, senderPin, receiverAccountNumber},
            amount,
        });
    }
}
