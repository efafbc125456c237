import type {Transaction} from './Transaction';

/**
 * 取引ログ（追記専用・挿入順）
 *
 * Bank 集約自身の処理はこのログを参照しない。
 * 保存と読み込みのためだけに存在する。
 */
export class TransactionLog {
    private readonly transactions: Transaction[];

    constructor(...transactions: Transaction[]) {
        this.transactions = transactions;
    }

    append(transaction: Transaction): void {
        this.transactions.push(transaction);
    }

    /**
     * 取引の一覧（挿入順）
     * 返す配列はコピーなので、変更してもログには影響しない
     */
    getTransactions(): Transaction[] {
        return [...this.transactions];
    }

    size(): number {
        return this.transactions.length;
    }
}
