import type {Account} from '../../domain/model/Account';
import type {CreateAccountCommand} from './CreateAccountCommand';
import type {DeleteAccountCommand} from './DeleteAccountCommand';
import type {EditAccountCommand} from './EditAccountCommand';
import type {GetAccountDetailsQuery} from './GetAccountDetailsQuery';

/**
 * 口座のライフサイクルに関するユースケース（入力ポート）
 *
 * 入力値が不正なコマンドは生成時点で InvalidArgumentException になるので、
 * ここに渡ってくるコマンドは常に検証済み。
 */
export interface AccountLifecycleUseCase {
    /**
     * @returns 口座番号。PINが4文字未満なら null（口座は作られない）
     */
    createAccount(command: CreateAccountCommand): string | null;

    /**
     * @throws AccountNotFoundException
     * @throws AuthenticationFailedException
     */
    editAccount(command: EditAccountCommand): boolean;

    /**
     * @throws AccountNotFoundException
     * @throws AuthenticationFailedException 名義またはPINが一致しない
     * @throws NonZeroBalanceException
     */
    deleteAccount(command: DeleteAccountCommand): boolean;

    /**
     * 口座番号とPINが一致しなければ null
     */
    getAccountDetails(query: GetAccountDetailsQuery): Account | null;
}

/**
 * DI用のシンボル
 */
export const AccountLifecycleUseCaseToken = Symbol('AccountLifecycleUseCase');
