/**
 * 保存先（口座ファイルと取引ファイルのパス）
 */
export interface BankStateLocation {
    readonly accountsPath: string;
    readonly transactionsPath: string;
}

/**
 * 既定の保存先（カレントディレクトリからの相対パス）
 */
export const DEFAULT_BANK_STATE_LOCATION: BankStateLocation = {
    accountsPath: 'data/accounts.json',
    transactionsPath: 'data/transactions.json',
};

/**
 * DI用のシンボル（設定された既定の保存先）
 */
export const BankStateLocationToken = Symbol('BankStateLocation');
