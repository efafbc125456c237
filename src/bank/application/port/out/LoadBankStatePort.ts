import type {RestoredBankState} from '../../domain/model/Bank';
import type {BankStateLocation} from './BankStateLocation';

// 依存関係の向き(永続化層がアプリケーション層に依存する)
// 永続化層（adapter/out/persistence）
//     ↓ 依存(実装)
// アプリケーション層のポート（application/port/out）(ここ)
//     ↑ 依存
// アプリケーション層のサービス（application/service）

/**
 * 保存済みの状態を読み込むための出力ポート
 * 永続化アダプターが実装する
 */
export interface LoadBankStatePort {
    /**
     * 口座と取引を読み込む
     *
     * ファイルが無い、または空のコレクションは undefined で返す
     * （呼び出し側はそのコレクションを置き換えない）。
     *
     * @throws PersistenceException
     * @throws MalformedDataException
     */
    loadBankState(location: BankStateLocation): Promise<RestoredBankState>;
}

/**
 * DI用のシンボル
 */
export const LoadBankStatePortToken = Symbol('LoadBankStatePort');
