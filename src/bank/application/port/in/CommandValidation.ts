import type {z} from 'zod';
import {InvalidArgumentException} from '../../domain/exception/InvalidArgumentException';

/**
 * コマンドのスキーマ検証を行い、失敗したら InvalidArgumentException を投げる
 *
 * 【どのエラーを報告するか】
 * zod はスキーマに宣言した順にすべての問題（issue）を集める。
 * ここでは最初の1件だけをメッセージにする。
 * つまり「スキーマのフィールド順 ＝ 検証順」になる。
 */
export function validateCommand<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
    const result = schema.safeParse(input);

    if (!result.success) {
        const [firstIssue] = result.error.issues;
        throw new InvalidArgumentException(firstIssue?.message ?? 'Invalid command');
    }

    return result.data;
}
