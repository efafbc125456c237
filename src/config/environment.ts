import {z} from 'zod';
import {DEFAULT_BANK_STATE_LOCATION} from '../bank/application/port/out/BankStateLocation';

/**
 * 環境変数の定義
 *
 * | 変数                    | 既定値                   |
 * |------------------------|-------------------------|
 * | BANK_STORAGE           | file（file / memory）    |
 * | BANK_ACCOUNTS_FILE     | data/accounts.json      |
 * | BANK_TRANSACTIONS_FILE | data/transactions.json  |
 * | BANK_RANDOM_SEED       | なし（暗号論的乱数を使う）  |
 *
 * 空文字は未設定と同じに扱う（.env に `BANK_RANDOM_SEED=` と書いた場合など）。
 */
const blankAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const EnvironmentSchema = z.object({
    BANK_STORAGE: z.preprocess(blankAsUndefined, z.enum(['file', 'memory']).default('file')),
    BANK_ACCOUNTS_FILE: z.preprocess(
        blankAsUndefined,
        z.string().default(DEFAULT_BANK_STATE_LOCATION.accountsPath)
    ),
    BANK_TRANSACTIONS_FILE: z.preprocess(
        blankAsUndefined,
        z.string().default(DEFAULT_BANK_STATE_LOCATION.transactionsPath)
    ),
    BANK_RANDOM_SEED: z.preprocess(blankAsUndefined, z.coerce.number().int().optional()),
});

export type AppEnvironment = z.infer<typeof EnvironmentSchema>;

/**
 * 環境変数を検証して設定オブジェクトにする
 *
 * @param source 既定は process.env（テストでは任意のオブジェクトを渡す）
 * @throws Error 値が不正な場合（どの変数が不正かをメッセージに含める）
 */
export function loadEnvironment(source: Record<string, string | undefined> = process.env): AppEnvironment {
    const result = EnvironmentSchema.safeParse(source);
    if (!result.success) {
        const details = result.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join(', ');
        throw new Error(`Invalid environment: ${details}`);
    }
    return result.data;
}
