import {isLosslessNumber, LosslessNumber} from 'lossless-json';
import {z} from 'zod';

/**
 * 保存ファイル中の JSON の数値
 *
 * lossless-json で解析すると、数値は元の10進表記を持った LosslessNumber になる。
 * 倍精度に丸めずに、その表記を文字列として取り出す。
 */
export const JsonNumberSchema = z.custom<LosslessNumber>((value) => isLosslessNumber(value), {
    message: 'Expected number',
});

/**
 * 金額（Balance / Amount）：10進表記の文字列として取り出す
 */
export const JsonDecimalSchema = JsonNumberSchema.transform((value) => value.toString());

/**
 * 10進表記をそのまま JSON の数値として書き出す
 */
export function toJsonNumber(decimal: string): LosslessNumber {
    return new LosslessNumber(decimal);
}
