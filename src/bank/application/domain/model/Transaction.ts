import {InvalidArgumentException} from '../exception/InvalidArgumentException';
import {ACCOUNT_NUMBER_LENGTH} from './AccountNumber';
import type {Money} from './Money';

/**
 * 取引の種類
 */
export const TransactionType = {
    Deposit: 'Deposit',
    Withdrawal: 'Withdrawal',
    Transfer: 'Transfer',
} as const;

export type TransactionType = (typeof TransactionType)[keyof typeof TransactionType];

/**
 * 取引エンティティ（取引ログの1行）
 *
 * 取引は以下の3種類：
 * 1. 入金（Deposit）：recipientAccountId = null
 * 2. 出金（Withdrawal）：recipientAccountId = null
 * 3. 送金（Transfer）：accountId = 送金元、recipientAccountId = 送金先
 *
 * 送金は送金元の視点で1件だけ記録する。送金先側の取引は作らない。
 * 生成後は変更されない。
 */
export class Transaction {
    constructor(
        private readonly transactionId: string,
        private readonly accountId: string,
        private readonly type: TransactionType,
        private readonly amount: Money,
        private readonly timestamp: Date,
        private readonly recipientAccountId: string | null
    ) {
        if (!transactionId) {
            throw new InvalidArgumentException('Transaction ID cannot be null or empty.');
        }
        if (!accountId) {
            throw new InvalidArgumentException('Account ID cannot be null or empty.');
        }
        if (!amount.isPositive()) {
            throw new InvalidArgumentException('Amount must be a positive value.');
        }
        if (Number.isNaN(timestamp.getTime())) {
            throw new InvalidArgumentException('Timestamp must be a valid date and time.');
        }
        if (type === TransactionType.Transfer && !recipientAccountId) {
            throw new InvalidArgumentException(
                'Recipient account ID cannot be null or empty for transfer transactions.'
            );
        }
        if (recipientAccountId !== null && recipientAccountId.length !== ACCOUNT_NUMBER_LENGTH) {
            throw new InvalidArgumentException('Recipient account ID must be exactly 11 digits long.');
        }
        if (accountId.length !== ACCOUNT_NUMBER_LENGTH) {
            throw new InvalidArgumentException('Account ID must be exactly 11 digits long.');
        }
        if (type !== TransactionType.Transfer && recipientAccountId !== null) {
            throw new InvalidArgumentException(
                'Recipient account ID is only allowed for transfer transactions.'
            );
        }
    }

    getTransactionId(): string {
        return this.transactionId;
    }

    getAccountId(): string {
        return this.accountId;
    }

    getType(): TransactionType {
        return this.type;
    }

    getAmount(): Money {
        return this.amount;
    }

    getTimestamp(): Date {
        return new Date(this.timestamp.getTime());
    }

    getRecipientAccountId(): string | null {
        return this.recipientAccountId;
    }

    isTransfer(): boolean {
        return this.type === TransactionType.Transfer;
    }
}
