import {BankingException} from './BankingException';

/**
 * 入力値不正例外
 *
 * 呼び出し側から渡された値そのものが不正な場合に投げる。
 * 状態（口座の有無や残高）を調べる前に必ず検出される。
 *
 * 【例】
 * - 口座番号が空、または11桁でない
 * - 金額が0以下
 * - 送金元と送金先が同じ口座
 */
export class InvalidArgumentException extends BankingException {
    readonly code = 'INVALID_ARGUMENT';

    constructor(message: string) {
        super(message);
    }
}
