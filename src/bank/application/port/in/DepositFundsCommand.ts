import {z} from 'zod';
import type {Money} from '../../domain/model/Money';
import {accountNumberSchema, positiveMoneySchema} from './CommandSchemas';
import {validateCommand} from './CommandValidation';

const DepositFundsCommandSchema = z.object({
    accountNumber: accountNumberSchema(),
    amount: positiveMoneySchema,
});

/**
 * 入金コマンド（PIN不要）
 */
export class DepositFundsCommand {
    constructor(
        public readonly accountNumber: string,
        public readonly amount: Money
    ) {
        validateCommand(DepositFundsCommandSchema, {accountNumber, amount});
    }
}
