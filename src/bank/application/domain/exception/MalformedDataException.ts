import {BankingException} from './BankingException';

/**
 * 保存データが解析できない場合の例外
 *
 * JSONとして壊れている、期待した構造でない、値が業務ルールに反する、のいずれか。
 * 何度読み直しても結果は変わらないので、リトライしない。
 */
export class MalformedDataException extends BankingException {
    readonly code = 'MALFORMED_DATA';

    constructor(
        public readonly source: string,
        detail: string,
        cause?: unknown
    ) {
        super(`Malformed data in ${source}: ${detail}`, {cause});
    }
}
