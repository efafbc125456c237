// ━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
// BankingException（銀行業務例外の基底クラス）
// ━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
//
// 【この基底クラスの目的】
// - 業務上の失敗を「種類（code）」で識別できるようにする
// - CLI などの入力アダプターが instanceof と code でメッセージを出し分けられる
//
// 【種類の一覧】
// INVALID_ARGUMENT       入力値が不正（空文字、桁数違い、0以下の金額…）
// ACCOUNT_NOT_FOUND      口座が存在しない
// AUTHENTICATION_FAILED  PIN / 名義が一致しない
// INSUFFICIENT_BALANCE   残高不足
// NON_ZERO_BALANCE       残高が残っている口座の削除
// PERSISTENCE_IO         ファイル入出力の失敗
// MALFORMED_DATA         保存データが解析できない
// ━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━

export type BankingErrorCode =
    | 'INVALID_ARGUMENT'
    | 'ACCOUNT_NOT_FOUND'
    | 'AUTHENTICATION_FAILED'
    | 'INSUFFICIENT_BALANCE'
    | 'NON_ZERO_BALANCE'
    | 'PERSISTENCE_IO'
    | 'MALFORMED_DATA';

export abstract class BankingException extends Error {
    abstract readonly code: BankingErrorCode;

    protected constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);

        // サブクラス名をそのままエラー名にする
        // 例: "InsufficientBalanceException: Insufficient funds"
        this.name = new.target.name;
    }
}
