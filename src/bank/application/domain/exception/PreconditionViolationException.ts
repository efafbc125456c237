import {BankingException} from './BankingException';

/**
 * 業務上の前提条件違反（入力は正しいが、口座の状態が操作を許さない）
 */
export abstract class PreconditionViolationException extends BankingException {
    protected constructor(
        public readonly accountNumber: string,
        message: string
    ) {
        super(message);
    }
}
