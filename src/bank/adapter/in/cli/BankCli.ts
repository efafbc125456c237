import {inject, injectable} from 'tsyringe';
import {BankingException} from '../../../application/domain/exception/BankingException';
import type {AccountLifecycleUseCase} from '../../../application/port/in/AccountLifecycleUseCase';
import {AccountLifecycleUseCaseToken} from '../../../application/port/in/AccountLifecycleUseCase';
import type {BankDataUseCase} from '../../../application/port/in/BankDataUseCase';
import {BankDataUseCaseToken} from '../../../application/port/in/BankDataUseCase';
import {CreateAccountCommand} from '../../../application/port/in/CreateAccountCommand';
import {DeleteAccountCommand} from '../../../application/port/in/DeleteAccountCommand';
import {DepositFundsCommand} from '../../../application/port/in/DepositFundsCommand';
import {EditAccountCommand} from '../../../application/port/in/EditAccountCommand';
import {GetAccountDetailsQuery} from '../../../application/port/in/GetAccountDetailsQuery';
import type {MoneyMovementUseCase} from '../../../application/port/in/MoneyMovementUseCase';
import {MoneyMovementUseCaseToken} from '../../../application/port/in/MoneyMovementUseCase';
import {TransferFundsCommand} from '../../../application/port/in/TransferFundsCommand';
import {WithdrawFundsCommand} from '../../../application/port/in/WithdrawFundsCommand';
import {describeError, formatMoney, parseAmount} from './mappers/CliInputMapper';
import type {Prompter} from './Prompter';
import {PrompterToken} from './Prompter';

const INVALID_AMOUNT_MESSAGE = 'Error: Please enter a valid positive amount.';

/**
 * 対話型メニュー（入力アダプター）
 *
 * 【処理の流れ】
 * 1. メニューを表示して番号を読む
 * 2. 対応する画面で入力を集め、コマンドに変換してユースケースを呼ぶ
 * 3. 結果（またはエラー）を表示する
 * 4. 終了を選んだ場合も含め、毎回データを保存する
 *
 * 空欄の入力はユースケースを呼ぶ前に弾く。
 * ユースケースの例外は「Error <操作>: <メッセージ>」として表示し、メニューに戻る。
 */
@injectable()
export class BankCli {
    constructor(
        @inject(AccountLifecycleUseCaseToken)
        private readonly accounts: AccountLifecycleUseCase,
        @inject(MoneyMovementUseCaseToken)
        private readonly money: MoneyMovementUseCase,
        @inject(BankDataUseCaseToken)
        private readonly bankData: BankDataUseCase,
        @inject(PrompterToken)
        private readonly prompter: Prompter
    ) {}

    /**
     * 終了（8 または入力の終わり）まで対話を続ける
     */
    async run(): Promise<void> {
        let running = true;

        while (running) {
            this.printMenu();
            const choice = await this.prompter.ask('Enter your choice: ');
            running = await this.dispatch(choice?.trim() ?? null);
            await this.save();
        }

        this.prompter.print('Application exiting. Goodbye!');
    }

    /**
     * @returns 対話を続けるなら true
     */
    private async dispatch(choice: string | null): Promise<boolean> {
        switch (choice) {
            case '1':
                await this.createAccount();
                return true;
            case '2':
                await this.editAccountName();
                return true;
            case '3':
                await this.deleteAccount();
                return true;
            case '4':
                await this.depositFunds();
                return true;
            case '5':
                await this.withdrawFunds();
                return true;
            case '6':
                await this.transferFunds();
                return true;
            case '7':
                await this.viewAccountDetails();
                return true;
            case '8':
            case null:
                return false;
            default:
                this.prompter.print('Invalid choice. Please try again.');
                return true;
        }
    }

    private printMenu(): void {
        this.printHeading('CLI Banking Application');
        this.prompter.print('1. Create New Account');
        this.prompter.print('2. Edit Account Name');
        this.prompter.print('3. Delete Account');
        this.prompter.print('4. Deposit Funds');
        this.prompter.print('5. Withdraw Funds');
        this.prompter.print('6. Transfer Funds');
        this.prompter.print('7. View Account Details');
        this.prompter.print('8. Exit');
    }

    // ========================================
    // 口座のライフサイクル
    // ========================================

    private async createAccount(): Promise<void> {
        this.printHeading('Create New Account');
        const name = await this.askRequired('Enter account holder name: ', 'Name cannot be empty.');
        if (name === null) return;
        const pin = await this.askRequired('Enter a 4-digit PIN: ', 'PIN cannot be empty.');
        if (pin === null) return;

        try {
            const accountNumber = this.accounts.createAccount(new CreateAccountCommand(name, pin));
            if (accountNumber !== null) {
                this.prompter.print(`Account created successfully! Account Number: ${accountNumber}`);
            } else {
                this.prompter.print('Failed to create account. Please ensure PIN is at least 4 digits.');
            }
        } catch (error) {
            this.printFailure('creating account', error);
        }
    }

    private async editAccountName(): Promise<void> {
        this.printHeading('Edit Account Name');
        const accountNumber = await this.askRequired('Enter account number: ', 'Account number cannot be empty.');
        if (accountNumber === null) return;
        const pin = await this.askRequired('Enter PIN: ', 'PIN cannot be empty.');
        if (pin === null) return;
        const newName = await this.askRequired('Enter new name: ', 'New name cannot be empty.');
        if (newName === null) return;

        try {
            const success = this.accounts.editAccount(new EditAccountCommand(accountNumber, pin, newName));
            this.prompter.print(success ? 'Account name updated successfully!' : 'Failed to update account name.');
        } catch (error) {
            this.printFailure('updating account', error);
        }
    }

    /**
     * 口座の削除
     *
     * 先に口座を照会し、残高が0でなければその場で断る。
     * 削除は y / yes の確認があった場合だけ行う。
     */
    private async deleteAccount(): Promise<void> {
        this.printHeading('Delete Account');
        const accountNumber = await this.askRequired('Enter account number: ', 'Account number cannot be empty.');
        if (accountNumber === null) return;
        const name = await this.askRequired('Enter account holder name: ', 'Name cannot be empty.');
        if (name === null) return;
        const pin = await this.askRequired('Enter PIN: ', 'PIN cannot be empty.');
        if (pin === null) return;

        try {
            const account = this.accounts.getAccountDetails(new GetAccountDetailsQuery(accountNumber, pin));
            if (account === null) {
                this.prompter.print('Account not found or incorrect PIN.');
                return;
            }

            if (!account.hasZeroBalance()) {
                this.prompter.print(
                    `Cannot delete account with non-zero balance. Current balance: ${formatMoney(account.getBalance())}`
                );
                this.prompter.print('Please withdraw all funds before deleting the account.');
                return;
            }

            const confirmation = await this.prompter.ask(
                `Are you sure you want to delete the account for ${account.getName()}? (y/N): `
            );
            const answer = confirmation?.trim().toLowerCase();
            if (answer !== 'y' && answer !== 'yes') {
                this.prompter.print('Account deletion cancelled.');
                return;
            }

            const success = this.accounts.deleteAccount(new DeleteAccountCommand(accountNumber, name, pin));
            this.prompter.print(success ? 'Account deleted successfully!' : 'Failed to delete account.');
        } catch (error) {
            this.printFailure('deleting account', error);
        }
    }

    private async viewAccountDetails(): Promise<void> {
        this.printHeading('View Account Details');
        const accountNumber = await this.askRequired('Enter account number: ', 'Account number cannot be empty.');
        if (accountNumber === null) return;
        const pin = await this.askRequired('Enter PIN: ', 'PIN cannot be empty.');
        if (pin === null) return;

        try {
            const account = this.accounts.getAccountDetails(new GetAccountDetailsQuery(accountNumber, pin));
            if (account === null) {
                this.prompter.print('Account not found or incorrect PIN.');
                return;
            }

            this.printHeading('Account Details');
            this.prompter.print(`Account Number: ${account.getAccountNumber()}`);
            this.prompter.print(`Account Holder: ${account.getName()}`);
            this.prompter.print(`Current Balance: ${formatMoney(account.getBalance())}`);
        } catch (error) {
            this.printFailure('retrieving account details', error);
        }
    }

    // ========================================
    // 入出金・送金
    // ========================================

    private async depositFunds(): Promise<void> {
        this.printHeading('Deposit Funds');
        const accountNumber = await this.askRequired('Enter account number: ', 'Account number cannot be empty.');
        if (accountNumber === null) return;
        const amount = parseAmount(await this.prompter.ask('Enter amount to deposit: $'));
        if (amount === null) {
            this.prompter.print(INVALID_AMOUNT_MESSAGE);
            return;
        }

        try {
            const success = this.money.depositFunds(new DepositFundsCommand(accountNumber, amount));
            this.prompter.print(success ? `Successfully deposited ${formatMoney(amount)}!` : 'Failed to deposit funds.');
        } catch (error) {
            this.printFailure('depositing funds', error);
        }
    }

    private async withdrawFunds(): Promise<void> {
        this.printHeading('Withdraw Funds');
        const accountNumber = await this.askRequired('Enter account number: ', 'Account number cannot be empty.');
        if (accountNumber === null) return;
        const pin = await this.askRequired('Enter PIN: ', 'PIN cannot be empty.');
        if (pin === null) return;
        const amount = parseAmount(await this.prompter.ask('Enter amount to withdraw: $'));
        if (amount === null) {
            this.prompter.print(INVALID_AMOUNT_MESSAGE);
            return;
        }

        try {
            const success = this.money.withdrawFunds(new WithdrawFundsCommand(accountNumber, pin, amount));
            this.prompter.print(success ? `Successfully withdrew ${formatMoney(amount)}!` : 'Failed to withdraw funds.');
        } catch (error) {
            this.printFailure('withdrawing funds', error);
        }
    }

    private async transferFunds(): Promise<void> {
        this.printHeading('Transfer Funds');
        const sender = await this.askRequired(
            'Enter sender account number: ',
            'Sender account number cannot be empty.'
        );
        if (sender === null) return;
        const pin = await this.askRequired('Enter sender PIN: ', 'PIN cannot be empty.');
        if (pin === null) return;
        const receiver = await this.askRequired(
            'Enter receiver account number: ',
            'Receiver account number cannot be empty.'
        );
        if (receiver === null) return;

        if (sender === receiver) {
            this.prompter.print('Error: Cannot transfer to the same account.');
            return;
        }

        const amount = parseAmount(await this.prompter.ask('Enter amount to transfer: $'));
        if (amount === null) {
            this.prompter.print(INVALID_AMOUNT_MESSAGE);
            return;
        }

        try {
            const success = this.money.transferFunds(new TransferFundsCommand(sender, pin, receiver, amount));
            this.prompter.print(
                success
                    ? `Successfully transferred ${formatMoney(amount)} from ${sender} to ${receiver}!`
                    : 'Failed to transfer funds.'
            );
        } catch (error) {
            this.printFailure('transferring funds', error);
        }
    }

    // ========================================
    // 保存と表示の補助
    // ========================================

    private async save(): Promise<void> {
        try {
            await this.bankData.saveData();
        } catch (error) {
            this.printFailure('saving data', error);
        }
    }

    /**
     * 空欄（空白だけを含む）なら「Error: ...」を表示して null を返す
     *
     * @returns 入力そのもの（前後の空白も PIN や名義の一部として残す）
     */
    private async askRequired(question: string, emptyMessage: string): Promise<string | null> {
        const answer = await this.prompter.ask(question);
        if (answer === null || answer.trim() === '') {
            this.prompter.print(`Error: ${emptyMessage}`);
            return null;
        }
        return answer;
    }

    private printHeading(title: string): void {
        this.prompter.print('');
        this.prompter.print(`--- ${title} ---`);
    }

    /**
     * 業務エラーはメッセージだけを表示する。
     * 予期しないエラーはスタックトレースもログに残す。
     */
    private printFailure(action: string, error: unknown): void {
        if (!(error instanceof BankingException)) {
            console.error('Unexpected error:', error);
        }
        this.prompter.print(`Error ${action}: ${describeError(error)}`);
    }
}
