import type {BankSnapshot} from '../../domain/model/Bank';
import type {BankStateLocation} from './BankStateLocation';

/**
 * 状態を保存するための出力ポート
 * 永続化アダプターが実装する
 */
export interface SaveBankStatePort {
    /**
     * 口座と取引をそれぞれのファイルへ丸ごと書き出す
     *
     * @throws PersistenceException
     */
    saveBankState(snapshot: BankSnapshot, location: BankStateLocation): Promise<void>;
}

/**
 * DI用のシンボル
 */
export const SaveBankStatePortToken = Symbol('SaveBankStatePort');
