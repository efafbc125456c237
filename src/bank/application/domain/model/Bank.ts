import type {Clock} from '../../../../common/time/Clock';
import {SystemClock} from '../../../../common/time/Clock';
import type {IdGenerator} from '../../../../common/id/IdGenerator';
import {UuidGenerator} from '../../../../common/id/IdGenerator';
import {CryptoRandomSource} from '../../../../common/random/RandomSource';
import {AccountNotFoundException} from '../exception/AccountNotFoundException';
import {AuthenticationFailedException} from '../exception/AuthenticationFailedException';
import {InvalidArgumentException} from '../exception/InvalidArgumentException';
import {NonZeroBalanceException} from '../exception/NonZeroBalanceException';
import {InsufficientBalanceException} from '../exception/InsufficientBalanceException';
import {AccountNumberGenerator} from '../service/AccountNumberGenerator';
import {Account} from './Account';
import {Money} from './Money';
import {Transaction, TransactionType} from './Transaction';
import {TransactionLog} from './TransactionLog';

/**
 * PINの最小桁数
 * これより短いPINでは口座を作らない（例外ではなく null を返す）
 */
export const MIN_PIN_LENGTH = 4;

/**
 * 集約の状態のスナップショット（保存用）
 */
export interface BankSnapshot {
    readonly accounts: readonly Account[];
    readonly transactions: readonly Transaction[];
}

/**
 * 読み込んだ状態
 *
 * undefined のコレクションは「置き換えない」を意味する
 * （ファイルが無い、または中身が空だった場合）。
 */
export interface RestoredBankState {
    readonly accounts?: readonly Account[];
    readonly transactions?: readonly Transaction[];
}

/**
 * 銀行集約（集約ルート）
 *
 * 【所有するもの】
 * - 口座の一覧（挿入順、口座番号で線形探索）
 * - 取引ログ（追記専用）
 *
 * 【不変条件】
 * - 口座番号は常に一意
 * - 残高は常に0以上（Account が保証）
 *
 * 【操作の原則】
 * すべての操作は「検証してから変更する」。
 * 検証が1つでも失敗した場合、口座にも取引ログにも変更は残らない。
 *
 * 入力値そのものの検証（空文字、桁数、金額の正負）は
 * port/in のコマンドが済ませている前提。
 */
export class Bank {
    private accounts: Account[] = [];
    private transactionLog = new TransactionLog();

    constructor(
        private readonly accountNumberGenerator: AccountNumberGenerator = new AccountNumberGenerator(
            new CryptoRandomSource()
        ),
        private readonly clock: Clock = new SystemClock(),
        private readonly idGenerator: IdGenerator = new UuidGenerator()
    ) {}

    // ========================================
    // 口座のライフサイクル
    // ========================================

    /**
     * 口座を開設する
     *
     * @returns 採番した口座番号。PINが短すぎる場合は null（口座は作らない）
     */
    openAccount(name: string, pin: string): string | null {
        if (pin.length < MIN_PIN_LENGTH) {
            return null;
        }

        const accountNumber = this.accountNumberGenerator.generate((candidate) =>
            this.accounts.some((account) => account.getAccountNumber() === candidate)
        );

        this.accounts.push(new Account(name, accountNumber, pin, Money.ZERO));
        return accountNumber;
    }

    renameAccount(accountNumber: string, pin: string, newName: string): void {
        const account = this.requireAccount(accountNumber);
        if (!account.matchesPin(pin)) {
            throw new AuthenticationFailedException(accountNumber);
        }

        account.rename(newName);
    }

    /**
     * 口座を閉じる
     *
     * 名義とPINはそれぞれ独立に照合する（両方一致が必要）。
     * 残高が0でなければ削除しない。
     */
    closeAccount(accountNumber: string, name: string, pin: string): void {
        const account = this.requireAccount(accountNumber);
        if (!account.matchesName(name)) {
            throw new AuthenticationFailedException(accountNumber, 'Name does not match');
        }
        if (!account.matchesPin(pin)) {
            throw new AuthenticationFailedException(accountNumber);
        }
        if (!account.hasZeroBalance()) {
            throw new NonZeroBalanceException(accountNumber, account.getBalance());
        }

        this.accounts = this.accounts.filter((candidate) => candidate !== account);
    }

    /**
     * 口座番号とPINの両方が一致する口座を探す
     *
     * 口座が無い場合もPINが違う場合も、同じく null を返す
     * （どちらが間違っていたかを呼び出し側に教えない）。
     */
    findAccount(accountNumber: string, pin: string): Account | null {
        const account = this.accounts.find(
            (candidate) =>
                candidate.getAccountNumber() === accountNumber && candidate.matchesPin(pin)
        );
        return account ? account.copy() : null;
    }

    // ========================================
    // 入出金・送金
    // ========================================

    deposit(accountNumber: string, amount: Money): Transaction {
        const account = this.requireAccount(accountNumber);

        const transaction = this.newTransaction(accountNumber, TransactionType.Deposit, amount, null);
        account.deposit(amount);
        this.transactionLog.append(transaction);

        return transaction;
    }

    withdraw(accountNumber: string, pin: string, amount: Money): Transaction {
        const account = this.requireAccount(accountNumber);
        if (!account.matchesPin(pin)) {
            throw new AuthenticationFailedException(accountNumber);
        }
        if (!account.mayWithdraw(amount)) {
            throw new InsufficientBalanceException(accountNumber, amount, account.getBalance());
        }

        const transaction = this.newTransaction(
            accountNumber,
            TransactionType.Withdrawal,
            amount,
            null
        );
        account.withdraw(amount);
        this.transactionLog.append(transaction);

        return transaction;
    }

    /**
     * 送金
     *
     * 【検証の順序】
     * 1. 送金元が存在するか
     * 2. 送金元のPINが一致するか
     * 3. 送金先が存在するか（PIN確認の後で初めて調べる）
     * 4. 送金元の残高が足りるか
     *
     * 取引ログには送金元の視点で Transfer を1件だけ記録する。
     */
    transfer(
        senderAccountNumber: string,
        senderPin: string,
        receiverAccountNumber: string,
        amount: Money
    ): Transaction {
        if (senderAccountNumber === receiverAccountNumber) {
            throw new InvalidArgumentException('Sender and receiver account numbers must be different');
        }

        const sender = this.findByNumber(senderAccountNumber);
        if (!sender) {
            throw new AccountNotFoundException(senderAccountNumber, 'Sender account not found');
        }
        if (!sender.matchesPin(senderPin)) {
            throw new AuthenticationFailedException(senderAccountNumber, 'Sender PIN does not match');
        }

        const receiver = this.findByNumber(receiverAccountNumber);
        if (!receiver) {
            throw new AccountNotFoundException(receiverAccountNumber, 'Receiver account not found');
        }
        if (!sender.mayWithdraw(amount)) {
            throw new InsufficientBalanceException(senderAccountNumber, amount, sender.getBalance());
        }

        const transaction = this.newTransaction(
            senderAccountNumber,
            TransactionType.Transfer,
            amount,
            receiverAccountNumber
        );
        sender.withdraw(amount);
        receiver.deposit(amount);
        this.transactionLog.append(transaction);

        return transaction;
    }

    // ========================================
    // スナップショット
    // ========================================

    snapshot(): BankSnapshot {
        return {
            accounts: this.accounts.map((account) => account.copy()),
            transactions: this.transactionLog.getTransactions(),
        };
    }

    /**
     * 読み込んだ状態でコレクションを丸ごと置き換える（マージはしない）
     *
     * 口座番号の重複があれば、何も置き換えずに失敗する。
     */
    restore(state: RestoredBankState): void {
        if (state.accounts) {
            assertUniqueAccountNumbers(state.accounts);
            this.accounts = state.accounts.map((account) => account.copy());
        }
        if (state.transactions) {
            this.transactionLog = new TransactionLog(...state.transactions);
        }
    }

    getAccountCount(): number {
        return this.accounts.length;
    }

    getTransactions(): Transaction[] {
        return this.transactionLog.getTransactions();
    }

    private findByNumber(accountNumber: string): Account | undefined {
        return this.accounts.find((account) => account.getAccountNumber() === accountNumber);
    }

    private requireAccount(accountNumber: string): Account {
        const account = this.findByNumber(accountNumber);
        if (!account) {
            throw new AccountNotFoundException(accountNumber);
        }
        return account;
    }

    private newTransaction(
        accountNumber: string,
        type: TransactionType,
        amount: Money,
        recipientAccountNumber: string | null
    ): Transaction {
        return new Transaction(
            this.idGenerator.nextId(),
            accountNumber,
            type,
            amount,
            this.clock.now(),
            recipientAccountNumber
        );
    }
}

function assertUniqueAccountNumbers(accounts: readonly Account[]): void {
    const seen = new Set<string>();
    for (const account of accounts) {
        if (seen.has(account.getAccountNumber())) {
            throw new InvalidArgumentException(`Duplicate account number: ${account.getAccountNumber()}`);
        }
        seen.add(account.getAccountNumber());
    }
}
