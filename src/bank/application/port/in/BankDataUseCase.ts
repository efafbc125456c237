import type {BankStateLocation} from '../out/BankStateLocation';

/**
 * 保存・読み込みのユースケース（入力ポート）
 *
 * パスを省略した場合は設定の既定値（data/accounts.json, data/transactions.json）を使う。
 */
export interface BankDataUseCase {
    /**
     * @throws PersistenceException
     * @throws MalformedDataException 失敗しても現在の状態は変わらない
     */
    loadData(location?: Partial<BankStateLocation>): Promise<void>;

    /**
     * @throws PersistenceException
     */
    saveData(location?: Partial<BankStateLocation>): Promise<void>;
}

/**
 * DI用のシンボル
 */
export const BankDataUseCaseToken = Symbol('BankDataUseCase');
