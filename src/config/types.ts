/**
 * DI用のトークン（アプリケーション全体で共有するもの）
 *
 * ポートごとのトークンは各ポートのファイルで宣言している。
 */
export const BankToken = Symbol('Bank');
