/**
 * 口座番号の書式
 *
 * 口座番号は11桁の10進数字列。先頭の0も有効な桁として扱うため、
 * 数値ではなく文字列で保持する（"00012345678" は11桁）。
 */
export const ACCOUNT_NUMBER_LENGTH = 11;

const ACCOUNT_NUMBER_PATTERN = new RegExp(`^\\d{${String(ACCOUNT_NUMBER_LENGTH)}}$`);

export function isAccountNumber(value: string): boolean {
    return ACCOUNT_NUMBER_PATTERN.test(value);
}
