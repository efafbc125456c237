import {z} from 'zod';
import type {Money} from '../../domain/model/Money';
import {accountNumberSchema, positiveMoneySchema, requiredString} from './CommandSchemas';
import {validateCommand} from './CommandValidation';

const WithdrawFundsCommandSchema = z.object({
    accountNumber: accountNumberSchema(),
    pin: requiredString('PIN cannot be null or empty'),
    amount: positiveMoneySchema,
});

/**
 * 出金コマンド
 */
export class WithdrawFundsCommand {
    constructor(
        public readonly accountNumber: string,
        public readonly pin: string,
        public readonly amount: Money
    ) {
        validateCommand(WithdrawFundsCommandSchema, {accountNumber, pin, amount});
    }
}
