import {BankingException} from './BankingException';

/**
 * 認証失敗例外（PIN または名義の不一致）
 *
 * 口座の存在を確認した「後」にだけ投げられる。
 * 参照系（GetAccountDetails）では投げずに null を返す。
 */
export class AuthenticationFailedException extends BankingException {
    readonly code = 'AUTHENTICATION_FAILED';

    constructor(
        public readonly accountNumber: string,
        message = 'PIN does not match'
    ) {
        super(message);
    }
}
