import {dirname} from 'node:path';
import {inject, injectable} from 'tsyringe';
import {BackOffPolicy, Retryable} from 'typescript-retry-decorator';
import type {RetryOptions} from 'typescript-retry-decorator';
import {MalformedDataException} from '../../../application/domain/exception/MalformedDataException';
import {PersistenceException} from '../../../application/domain/exception/PersistenceException';
import type {BankSnapshot, RestoredBankState} from '../../../application/domain/model/Bank';
import type {LoadBankStatePort} from '../../../application/port/out/LoadBankStatePort';
import type {SaveBankStatePort} from '../../../application/port/out/SaveBankStatePort';
import type {BankStateLocation} from '../../../application/port/out/BankStateLocation';
import type {DataFileSystem} from './DataFileSystem';
import {DataFileSystemToken, errorCodeOf} from './DataFileSystem';
import {
    serialize,
    toAccountRecords,
    toAccounts,
    toTransactionRecords,
    toTransactions,
} from './mappers/BankStateMapper';

/**
 * 一時的なファイルの競合とみなすエラーコード
 * （他プロセスがロック中、ファイルディスクリプタの枯渇など）
 */
const TRANSIENT_ERROR_CODES: ReadonlySet<string> = new Set(['EBUSY', 'EAGAIN', 'EMFILE', 'ENFILE']);

export function isTransientFileError(error: unknown): boolean {
    const code = errorCodeOf(error);
    return code !== undefined && TRANSIENT_ERROR_CODES.has(code);
}

/**
 * 読み書きのリトライ設定
 *
 * 初回 + 再試行2回 = 合計3回。待ち時間は 50ms → 100ms。
 * 一時的でない失敗は即座に投げる。
 */
const FILE_RETRY_OPTIONS = {
    maxAttempts: 2,
    backOffPolicy: BackOffPolicy.ExponentialBackOffPolicy,
    backOff: 50,
    exponentialOption: {maxInterval: 1000, multiplier: 2},
    doRetry: isTransientFileError,
    useOriginalError: true,
    useConsoleLogger: false,
} satisfies RetryOptions;

type FileOperation = 'read' | 'write';

/**
 * JSONファイルによる永続化アダプター
 *
 * 【責務】
 * - 口座と取引のスナップショットを2つのJSONファイルに保存する
 * - 2つのファイルを読み込み、ドメインモデルに復元する
 * - Node.js のエラーを PersistenceException / MalformedDataException に変換する
 *
 * 【読み込みの規則】
 * - ファイルが無い、または中身が空白だけ → そのコレクションは置き換えない（undefined）
 * - 両方のファイルを解析し終えてから結果を返す
 *   （片方が壊れていれば、どちらも置き換わらない）
 */
@injectable()
export class JsonFileBankStateAdapter implements LoadBankStatePort, SaveBankStatePort {
    constructor(
        @inject(DataFileSystemToken)
        private readonly fileSystem: DataFileSystem
    ) {}

    async loadBankState(location: BankStateLocation): Promise<RestoredBankState> {
        try {
            const accountsJson = await this.readIfPresent(location.accountsPath);
            const transactionsJson = await this.readIfPresent(location.transactionsPath);

            return {
                accounts:
                    accountsJson === undefined ? undefined : toAccounts(accountsJson, location.accountsPath),
                transactions:
                    transactionsJson === undefined
                        ? undefined
                        : toTransactions(transactionsJson, location.transactionsPath),
            };
        } catch (error) {
            throw toPersistenceFailure(error, 'read');
        }
    }

    async saveBankState(snapshot: BankSnapshot, location: BankStateLocation): Promise<void> {
        try {
            const directories = new Set([
                dirname(location.accountsPath),
                dirname(location.transactionsPath),
            ]);
            for (const directory of directories) {
                await this.fileSystem.ensureDirectory(directory);
            }

            await this.writeWithRetry(location.accountsPath, serialize(toAccountRecords(snapshot.accounts)));
            await this.writeWithRetry(
                location.transactionsPath,
                serialize(toTransactionRecords(snapshot.transactions))
            );
        } catch (error) {
            throw toPersistenceFailure(error, 'write');
        }
    }

    private async readIfPresent(path: string): Promise<string | undefined> {
        if (!(await this.fileSystem.exists(path))) {
            return undefined;
        }

        const text = await this.readWithRetry(path);
        return text.trim() === '' ? undefined : text;
    }

    @Retryable(FILE_RETRY_OPTIONS)
    private async readWithRetry(path: string): Promise<string> {
        return this.fileSystem.readText(path);
    }

    @Retryable(FILE_RETRY_OPTIONS)
    private async writeWithRetry(path: string, content: string): Promise<void> {
        await this.fileSystem.writeText(path, content);
    }
}

const FAILURE_MESSAGES = {
    read: {
        DIRECTORY_NOT_FOUND: 'The data directory does not exist.',
        PERMISSION_DENIED: 'Permission denied when accessing data files.',
        UNEXPECTED: 'Error reading data files',
    },
    write: {
        DIRECTORY_NOT_FOUND: 'Unable to create or access the data directory.',
        PERMISSION_DENIED: 'Permission denied when writing to data files.',
        UNEXPECTED: 'Error writing data files',
    },
} as const;

/**
 * 読み書き中に起きたエラーを永続化の例外に変換する
 * 既に変換済みの例外（壊れたデータ）はそのまま返す
 */
function toPersistenceFailure(
    error: unknown,
    operation: FileOperation
): PersistenceException | MalformedDataException {
    if (error instanceof MalformedDataException || error instanceof PersistenceException) {
        return error;
    }

    const messages = FAILURE_MESSAGES[operation];
    const code = errorCodeOf(error);

    if (code === 'ENOENT' || code === 'ENOTDIR') {
        return new PersistenceException('DIRECTORY_NOT_FOUND', messages.DIRECTORY_NOT_FOUND, error);
    }
    if (code === 'EACCES' || code === 'EPERM') {
        return new PersistenceException('PERMISSION_DENIED', messages.PERMISSION_DENIED, error);
    }

    const detail = error instanceof Error ? error.message : String(error);
    return new PersistenceException('UNEXPECTED', `${messages.UNEXPECTED}: ${detail}`, error);
}
