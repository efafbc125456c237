import {BankingException} from './BankingException';

/**
 * 口座が見つからない場合の例外
 *
 * 【メッセージ】
 * 送金では送金元・送金先のどちらが無かったかを区別する：
 * - "Account not found"
 * - "Sender account not found"
 * - "Receiver account not found"
 */
export class AccountNotFoundException extends BankingException {
    readonly code = 'ACCOUNT_NOT_FOUND';

    constructor(
        public readonly accountNumber: string,
        message = 'Account not found'
    ) {
        super(message);
    }
}
