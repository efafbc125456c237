import type {Money} from '../model/Money';
import {PreconditionViolationException} from './PreconditionViolationException';

/**
 * 残高が0でない口座を削除しようとした場合の例外
 *
 * 名義・PINが正しくても、残高が残っている限り削除できない。
 */
export class NonZeroBalanceException extends PreconditionViolationException {
    readonly code = 'NON_ZERO_BALANCE';

    constructor(
        accountNumber: string,
        public readonly currentBalance: Money
    ) {
        super(accountNumber, 'Account balance must be zero before deletion');
    }
}
