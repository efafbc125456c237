// ━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
// InsufficientBalanceException（残高不足例外）
// ━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
//
// 【この例外クラスの目的】
// - 出金・送金で残高が足りない場合に投げられる
// - 試行金額と現在残高を保持し、呼び出し側が詳細を表示できる
//
// 【メッセージ】
// message は "Insufficient funds" で固定。
// 金額の詳細は attemptedAmount / currentBalance から取り出す。
// ━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━

import type {Money} from '../model/Money';
import {PreconditionViolationException} from './PreconditionViolationException';

export class InsufficientBalanceException extends PreconditionViolationException {
    readonly code = 'INSUFFICIENT_BALANCE';

    constructor(
        accountNumber: string,
        public readonly attemptedAmount: Money,
        public readonly currentBalance: Money
    ) {
        super(accountNumber, 'Insufficient funds');
    }
}
