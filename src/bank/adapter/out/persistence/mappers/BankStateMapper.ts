import {parse, stringify} from 'lossless-json';
import type {z} from 'zod';
import {InvalidArgumentException} from '../../../../application/domain/exception/InvalidArgumentException';
import {MalformedDataException} from '../../../../application/domain/exception/MalformedDataException';
import {Account} from '../../../../application/domain/model/Account';
import {Money} from '../../../../application/domain/model/Money';
import {Transaction} from '../../../../application/domain/model/Transaction';
import type {AccountRecord} from '../entities/AccountRecord';
import {AccountRecordListSchema} from '../entities/AccountRecord';
import {toJsonNumber} from '../entities/JsonNumber';
import type {PersistedTransactionRecord, TransactionRecord} from '../entities/TransactionRecord';
import {TRANSACTION_TYPE_ORDINALS, TransactionRecordListSchema} from '../entities/TransactionRecord';

/**
 * 保存ファイルとドメインモデルの間でモデルを変換するマッパー
 *
 * 責務：
 * - JSON文字列 → レコード（zod で構造を検証）→ ドメインモデル
 * - ドメインモデル → レコード → インデント付きJSON文字列
 *
 * 金額は lossless-json で読み書きし、倍精度の数値を経由させない。
 * 読み込み時の失敗（JSON構文、構造、ドメインの検証、口座番号の重複）は
 * すべて MalformedDataException にする。
 */

// ========================================
// 読み込み（ファイル → ドメイン）
// ========================================

export function toAccounts(json: string, source: string): Account[] {
    const records = parseRecords(json, source, AccountRecordListSchema);
    const seen = new Set<string>();

    return records.map((record, index) => {
        const account = toDomain(source, index, () =>
            new Account(record.Name, record.AccountNumber, record.Pin, Money.of(record.Balance))
        );

        if (seen.has(account.getAccountNumber())) {
            throw new MalformedDataException(
                source,
                `record ${String(index)}: Duplicate account number: ${account.getAccountNumber()}`
            );
        }
        seen.add(account.getAccountNumber());

        return account;
    });
}

export function toTransactions(json: string, source: string): Transaction[] {
    const records = parseRecords(json, source, TransactionRecordListSchema);

    return records.map((record, index) =>
        toDomain(source, index, () => transactionToDomain(record))
    );
}

function transactionToDomain(record: PersistedTransactionRecord): Transaction {
    const type = typeof record.Type === 'number' ? TRANSACTION_TYPE_ORDINALS[record.Type] : record.Type;

    return new Transaction(
        record.TransactionId,
        record.AccountId,
        type,
        Money.of(record.Amount),
        new Date(record.Timestamp),
        record.RecipientAccountId ?? null
    );
}

function parseRecords<T>(
    json: string,
    source: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T {
    let parsed: unknown;
    try {
        parsed = parse(json);
    } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        throw new MalformedDataException(source, detail, error);
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
        const [firstIssue] = result.error.issues;
        const detail = firstIssue
            ? `${firstIssue.path.join('.') || '(root)'}: ${firstIssue.message}`
            : 'unexpected structure';
        throw new MalformedDataException(source, detail, result.error);
    }

    return result.data;
}

/**
 * ドメインの検証エラーを「何件目のレコードか」付きの MalformedDataException に包む
 */
function toDomain<T>(source: string, index: number, build: () => T): T {
    try {
        return build();
    } catch (error) {
        if (error instanceof InvalidArgumentException) {
            throw new MalformedDataException(source, `record ${String(index)}: ${error.message}`, error);
        }
        throw error;
    }
}

// ========================================
// 書き出し（ドメイン → ファイル）
// ========================================

export function toAccountRecords(accounts: readonly Account[]): AccountRecord[] {
    return accounts.map((account) => ({
        Name: account.getName(),
        AccountNumber: account.getAccountNumber(),
        Pin: account.getPin(),
        Balance: toJsonNumber(account.getBalance().toDecimalString()),
    }));
}

export function toTransactionRecords(transactions: readonly Transaction[]): TransactionRecord[] {
    return transactions.map((transaction) => ({
        TransactionId: transaction.getTransactionId(),
        AccountId: transaction.getAccountId(),
        Type: transaction.getType(),
        Amount: toJsonNumber(transaction.getAmount().toDecimalString()),
        Timestamp: transaction.getTimestamp().toISOString(),
        RecipientAccountId: transaction.getRecipientAccountId(),
    }));
}

/**
 * 人が読めるように2スペースでインデントする
 */
export function serialize(records: readonly unknown[]): string {
    return stringify(records, undefined, 2) ?? '[]';
}
