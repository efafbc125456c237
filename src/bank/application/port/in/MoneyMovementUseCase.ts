import type {DepositFundsCommand} from './DepositFundsCommand';
import type {TransferFundsCommand} from './TransferFundsCommand';
import type {WithdrawFundsCommand} from './WithdrawFundsCommand';

/**
 * 入出金・送金のユースケース（入力ポート）
 *
 * 成功時は true を返す。失敗はすべて例外で表す：
 * - AccountNotFoundException
 * - AuthenticationFailedException
 * - InsufficientBalanceException
 */
export interface MoneyMovementUseCase {
    depositFunds(command: DepositFundsCommand): boolean;

    withdrawFunds(command: WithdrawFundsCommand): boolean;

    transferFunds(command: TransferFundsCommand): boolean;
}

/**
 * DI用のシンボル
 */
export const MoneyMovementUseCaseToken = Symbol('MoneyMovementUseCase');
