import type {RandomSource} from '../../../../common/random/RandomSource';
import {ACCOUNT_NUMBER_LENGTH} from '../model/AccountNumber';

const DIGITS = '0123456789';

/**
 * 口座番号の採番サービス
 *
 * 【アルゴリズム】
 * 1. 各桁を 0〜9 から一様に選び、11桁の数字列を作る
 * 2. 既存の口座番号と衝突したら、1 からやり直す（棄却サンプリング）
 *
 * 候補は 10^11 通りあるので、口座数が十分少なければ期待試行回数はほぼ1回。
 * 衝突判定は呼び出し時点の口座一覧に対して行う。
 */
export class AccountNumberGenerator {
    constructor(private readonly random: RandomSource) {}

    /**
     * @param isTaken 候補が既存の口座番号と衝突するかどうか
     */
    generate(isTaken: (candidate: string) => boolean): string {
        let candidate = this.draw();
        while (isTaken(candidate)) {
            candidate = this.draw();
        }
        return candidate;
    }

    private draw(): string {
        let accountNumber = '';
        for (let i = 0; i < ACCOUNT_NUMBER_LENGTH; i++) {
            accountNumber += DIGITS[this.random.nextInt(DIGITS.length)];
        }
        return accountNumber;
    }
}
