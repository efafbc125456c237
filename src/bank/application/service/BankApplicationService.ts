import {inject, injectable} from 'tsyringe';
import {BankToken} from '../../../config/types';
import type {Account} from '../domain/model/Account';
import type {Bank} from '../domain/model/Bank';
import type {AccountLifecycleUseCase} from '../port/in/AccountLifecycleUseCase';
import type {BankDataUseCase} from '../port/in/BankDataUseCase';
import type {CreateAccountCommand} from '../port/in/CreateAccountCommand';
import type {DeleteAccountCommand} from '../port/in/DeleteAccountCommand';
import type {DepositFundsCommand} from '../port/in/DepositFundsCommand';
import type {EditAccountCommand} from '../port/in/EditAccountCommand';
import type {GetAccountDetailsQuery} from '../port/in/GetAccountDetailsQuery';
import type {MoneyMovementUseCase} from '../port/in/MoneyMovementUseCase';
import type {TransferFundsCommand} from '../port/in/TransferFundsCommand';
import type {WithdrawFundsCommand} from '../port/in/WithdrawFundsCommand';
import type {BankStateLocation} from '../port/out/BankStateLocation';
import {BankStateLocationToken} from '../port/out/BankStateLocation';
import type {LoadBankStatePort} from '../port/out/LoadBankStatePort';
import {LoadBankStatePortToken} from '../port/out/LoadBankStatePort';
import type {SaveBankStatePort} from '../port/out/SaveBankStatePort';
import {SaveBankStatePortToken} from '../port/out/SaveBankStatePort';

/**
 * 銀行アプリケーションサービス
 *
 * 役割: ユースケースの調整
 * - 入力ポート（AccountLifecycleUseCase, MoneyMovementUseCase, BankDataUseCase）を実装
 * - 業務ルールの判定は Bank 集約に委譲する
 * - 保存・読み込みは出力ポート経由で行い、具体的な保存方法（JSONファイル / インメモリ）は知らない
 *
 * 【同期と非同期】
 * 口座操作は同期的に完了する（途中で中断されない）。
 * 非同期なのは保存・読み込みだけ。
 */
@injectable()
export class BankApplicationService
    implements AccountLifecycleUseCase, MoneyMovementUseCase, BankDataUseCase
{
    constructor(
        @inject(BankToken)
        private readonly bank: Bank,
        @inject(LoadBankStatePortToken)
        private readonly loadBankStatePort: LoadBankStatePort,
        @inject(SaveBankStatePortToken)
        private readonly saveBankStatePort: SaveBankStatePort,
        @inject(BankStateLocationToken)
        private readonly defaultLocation: BankStateLocation
    ) {}

    // ========================================
    // 口座のライフサイクル
    // ========================================

    createAccount(command: CreateAccountCommand): string | null {
        return this.bank.openAccount(command.name, command.pin);
    }

    editAccount(command: EditAccountCommand): boolean {
        this.bank.renameAccount(command.accountNumber, command.oldPin, command.newName);
        return true;
    }

    deleteAccount(command: DeleteAccountCommand): boolean {
        this.bank.closeAccount(command.accountNumber, command.name, command.pin);
        return true;
    }

    getAccountDetails(query: GetAccountDetailsQuery): Account | null {
        return this.bank.findAccount(query.accountNumber, query.pin);
    }

    // ========================================
    // 入出金・送金
    // ========================================

    depositFunds(command: DepositFundsCommand): boolean {
        this.bank.deposit(command.accountNumber, command.amount);
        return true;
    }

    withdrawFunds(command: WithdrawFundsCommand): boolean {
        this.bank.withdraw(command.accountNumber, command.pin, command.amount);
        return true;
    }

    transferFunds(command: TransferFundsCommand): boolean {
        this.bank.transfer(
            command.senderAccountNumber,
            command.senderPin,
            command.receiverAccountNumber,
            command.amount
        );
        return true;
    }

    // ========================================
    // 保存・読み込み
    // ========================================

    /**
     * 保存済みの状態を読み込み、存在したコレクションを丸ごと置き換える
     *
     * 【処理の流れ】
     * 1. 出力ポートで両方のファイルを読み込み・解析する
     * 2. 両方とも成功した場合だけ、集約の状態を置き換える
     *
     * 1 で失敗した場合、集約には一切手を付けない。
     */
    async loadData(location?: Partial<BankStateLocation>): Promise<void> {
        const state = await this.loadBankStatePort.loadBankState(this.resolveLocation(location));

        this.bank.restore(state);

        console.log(
            `📂 Bank data loaded (accounts: ${String(this.bank.getAccountCount())}, ` +
                `transactions: ${String(this.bank.getTransactions().length)})`
        );
    }

    async saveData(location?: Partial<BankStateLocation>): Promise<void> {
        await this.saveBankStatePort.saveBankState(
            this.bank.snapshot(),
            this.resolveLocation(location)
        );
    }

    private resolveLocation(location?: Partial<BankStateLocation>): BankStateLocation {
        return {
            accountsPath: location?.accountsPath ?? this.defaultLocation.accountsPath,
            transactionsPath: location?.transactionsPath ?? this.defaultLocation.transactionsPath,
        };
    }
}
