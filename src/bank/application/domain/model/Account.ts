import {InsufficientBalanceException} from '../exception/InsufficientBalanceException';
import {InvalidArgumentException} from '../exception/InvalidArgumentException';
import {isAccountNumber} from './AccountNumber';
import {Money} from './Money';

/**
 * 口座エンティティ
 *
 * 【不変条件】
 * - 残高は常に0以上
 * - 口座番号は11桁の数字で、生成後は変わらない
 *
 * 【ライフサイクル】
 * 口座は Bank 集約だけが生成・変更・削除する。
 * 外部に返すときは copy() で切り離したインスタンスを渡す。
 */
export class Account {
    private readonly accountNumber: string;
    private name: string;
    private readonly pin: string;
    private balance: Money;

    /**
     * 検証順序：名義 → 口座番号 → PIN → 残高
     * 複数の値が同時に不正な場合は、先に検証された方のエラーになる。
     */
    constructor(name: string, accountNumber: string, pin: string, balance: Money) {
        if (!name) {
            throw new InvalidArgumentException('Name cannot be null or empty.');
        }
        if (!accountNumber || !isAccountNumber(accountNumber)) {
            throw new InvalidArgumentException('Account number must be an 11-digit string.');
        }
        if (!pin) {
            throw new InvalidArgumentException('Pin cannot be null or empty.');
        }
        if (balance.isNegative()) {
            throw new InvalidArgumentException('Balance cannot be negative.');
        }

        this.name = name;
        this.accountNumber = accountNumber;
        this.pin = pin;
        this.balance = balance;
    }

    getName(): string {
        return this.name;
    }

    getAccountNumber(): string {
        return this.accountNumber;
    }

    getPin(): string {
        return this.pin;
    }

    getBalance(): Money {
        return this.balance;
    }

    /**
     * PINの照合
     *
     * 【注意】平文比較。ハッシュ化はしていない。
     */
    matchesPin(pin: string): boolean {
        return this.pin === pin;
    }

    matchesName(name: string): boolean {
        return this.name === name;
    }

    hasZeroBalance(): boolean {
        return this.balance.isZero();
    }

    /**
     * 出金可能かどうか
     */
    mayWithdraw(money: Money): boolean {
        return this.balance.isGreaterThanOrEqualTo(money);
    }

    rename(newName: string): void {
        if (!newName) {
            throw new InvalidArgumentException('Name cannot be null or empty.');
        }
        this.name = newName;
    }

    deposit(money: Money): void {
        this.balance = this.balance.plus(money);
    }

    /**
     * 出金
     *
     * @throws InsufficientBalanceException 残高が足りない場合（残高は変わらない）
     */
    withdraw(money: Money): void {
        if (!this.mayWithdraw(money)) {
            throw new InsufficientBalanceException(this.accountNumber, money, this.balance);
        }
        this.balance = this.balance.minus(money);
    }

    /**
     * 集約の外へ渡すための複製
     */
    copy(): Account {
        return new Account(this.name, this.accountNumber, this.pin, this.balance);
    }
}
