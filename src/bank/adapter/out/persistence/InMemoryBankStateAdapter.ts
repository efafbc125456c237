import {injectable} from 'tsyringe';
import type {Account} from '../../../application/domain/model/Account';
import type {BankSnapshot, RestoredBankState} from '../../../application/domain/model/Bank';
import type {Transaction} from '../../../application/domain/model/Transaction';
import type {BankStateLocation} from '../../../application/port/out/BankStateLocation';
import type {LoadBankStatePort} from '../../../application/port/out/LoadBankStatePort';
import type {SaveBankStatePort} from '../../../application/port/out/SaveBankStatePort';

/**
 * インメモリ実装（開発・デモ用）
 *
 * パスをキーにしたMapに保存する。プロセスが終われば消える。
 * まだ保存されていないパスは「ファイルが無い」のと同じ扱い。
 */
@injectable()
export class InMemoryBankStateAdapter implements LoadBankStatePort, SaveBankStatePort {
    private readonly accountFiles = new Map<string, Account[]>();
    private readonly transactionFiles = new Map<string, Transaction[]>();

    async loadBankState(location: BankStateLocation): Promise<RestoredBankState> {
        const accounts = this.accountFiles.get(location.accountsPath);
        const transactions = this.transactionFiles.get(location.transactionsPath);

        return {
            accounts: accounts?.map((account) => account.copy()),
            transactions: transactions ? [...transactions] : undefined,
        };
    }

    async saveBankState(snapshot: BankSnapshot, location: BankStateLocation): Promise<void> {
        this.accountFiles.set(
            location.accountsPath,
            snapshot.accounts.map((account) => account.copy())
        );
        this.transactionFiles.set(location.transactionsPath, [...snapshot.transactions]);
    }

    /**
     * テスト用：全データをクリア
     */
    clear(): void {
        this.accountFiles.clear();
        this.transactionFiles.clear();
    }
}
