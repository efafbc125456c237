import {BankingException} from './BankingException';

/**
 * 入出金データの保存・読み込みで起きた I/O の失敗の種類
 *
 * DIRECTORY_NOT_FOUND  保存先ディレクトリ（またはファイルのパス）が無い
 * PERMISSION_DENIED    権限がない
 * UNEXPECTED           それ以外（リトライを使い切った一時的な失敗を含む）
 */
export type PersistenceFailureKind = 'DIRECTORY_NOT_FOUND' | 'PERMISSION_DENIED' | 'UNEXPECTED';

/**
 * 永続化 I/O 例外
 *
 * 元のエラー（Node.js の ErrnoException など）は cause に保持する。
 */
export class PersistenceException extends BankingException {
    readonly code = 'PERSISTENCE_IO';

    constructor(
        public readonly kind: PersistenceFailureKind,
        message: string,
        cause?: unknown
    ) {
        super(message, {cause});
    }
}
