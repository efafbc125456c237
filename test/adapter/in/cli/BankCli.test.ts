import "reflect-metadata"

import {afterEach, beforeEach, describe, expect, it, vi} from "vitest";
import {BankCli} from "../../../../src/bank/adapter/in/cli/BankCli";
import {PrompterToken} from "../../../../src/bank/adapter/in/cli/Prompter";
import {InMemoryBankStateAdapter} from "../../../../src/bank/adapter/out/persistence/InMemoryBankStateAdapter";
import {PersistenceException} from "../../../../src/bank/application/domain/exception/PersistenceException";
import {AccountNumberGenerator} from "../../../../src/bank/application/domain/service/AccountNumberGenerator";
import type {SaveBankStatePort} from "../../../../src/bank/application/port/out/SaveBankStatePort";
import {SaveBankStatePortToken} from "../../../../src/bank/application/port/out/SaveBankStatePort";
import {SeededRandomSource} from "../../../../src/common/random/RandomSource";
import {container, resetContainer, setupContainer} from "../../../../src/config/container";
import type {AppEnvironment} from "../../../../src/config/environment";
import {ScriptedPrompter} from "../../../helpers/ScriptedPrompter";

const SEED = 42;

const env: AppEnvironment = {
    BANK_STORAGE: "memory",
    BANK_ACCOUNTS_FILE: "data/accounts.json",
    BANK_TRANSACTIONS_FILE: "data/transactions.json",
    BANK_RANDOM_SEED: SEED,
};

/**
 * 同じシードの銀行が採番する口座番号を、開設順に count 件求める
 */
function expectedAccountNumbers(count: number): string[] {
    const generator = new AccountNumberGenerator(new SeededRandomSource(SEED));
    const numbers: string[] = [];
    for (let i = 0; i < count; i++) {
        numbers.push(generator.generate((candidate) => numbers.includes(candidate)));
    }
    return numbers;
}

/**
 * 回答を流し込んでメニューを最後まで実行する
 */
async function runCli(answers: string[]): Promise<ScriptedPrompter> {
    const prompter = new ScriptedPrompter(answers);
    container.register(PrompterToken, {useValue: prompter});
    await container.resolve(BankCli).run();
    return prompter;
}

/**
 * BankCli のテスト
 *
 * DIコンテナはインメモリ保存・シード付き採番で本物を組み立てる。
 * 入出力だけを ScriptedPrompter に差し替える。
 */
describe("BankCli", () => {
    beforeEach(() => {
        vi.spyOn(console, "log").mockImplementation(() => undefined);
        setupContainer(env);
    });

    afterEach(() => {
        resetContainer();
        vi.restoreAllMocks();
    });

    // ===== メニュー =====

    it("8 を選ぶと保存して終了する", async () => {
        // Act
        const prompter = await runCli(["8"]);

        // Assert
        expect(prompter.lines.slice(0, 3)).toEqual(["", "--- CLI Banking Application ---", "1. Create New Account"]);
        expect(prompter.lines.at(-1)).toBe("Application exiting. Goodbye!");
        const saved = await container.resolve(InMemoryBankStateAdapter).loadBankState({
            accountsPath: "data/accounts.json",
            transactionsPath: "data/transactions.json",
        });
        expect(saved.accounts).toEqual([]);
    });

    it("一覧に無い番号は 'Invalid choice' を表示してメニューに戻る", async () => {
        // Act
        const prompter = await runCli(["9", "8"]);

        // Assert
        expect(prompter.lines).toContain("Invalid choice. Please try again.");
        expect(prompter.questions.filter((q) => q === "Enter your choice: ")).toHaveLength(2);
    });

    it("入力が終わったら終了する", async () => {
        // Act
        const prompter = await runCli([]);

        // Assert
        expect(prompter.lines.at(-1)).toBe("Application exiting. Goodbye!");
    });

    // ===== 口座の開設 =====

    it("口座を開設すると口座番号を表示し、保存される", async () => {
        // Arrange
        const [accountNumber] = expectedAccountNumbers(1);

        // Act
        const prompter = await runCli(["1", "John Doe", "1234", "8"]);

        // Assert
        expect(prompter.lines).toContain(`Account created successfully! Account Number: ${String(accountNumber)}`);
        const saved = await container.resolve(InMemoryBankStateAdapter).loadBankState({
            accountsPath: "data/accounts.json",
            transactionsPath: "data/transactions.json",
        });
        expect(saved.accounts?.map((a) => a.getName())).toEqual(["John Doe"]);
    });

    it("短いPINでは開設に失敗したことを表示する", async () => {
        // Act
        const prompter = await runCli(["1", "John Doe", "12", "8"]);

        // Assert
        expect(prompter.lines).toContain("Failed to create account. Please ensure PIN is at least 4 digits.");
    });

    it("名義とPINは前後の空白も含めてそのまま登録する", async () => {
        // Arrange
        const [accountNumber] = expectedAccountNumbers(1);

        // Act
        const prompter = await runCli(["1", " John Doe ", "123 ", "8"]);

        // Assert
        expect(prompter.lines).toContain(`Account created successfully! Account Number: ${String(accountNumber)}`);
        const saved = await container.resolve(InMemoryBankStateAdapter).loadBankState({
            accountsPath: "data/accounts.json",
            transactionsPath: "data/transactions.json",
        });
        expect(saved.accounts?.map((a) => [a.getName(), a.getPin()])).toEqual([[" John Doe ", "123 "]]);
    });

    it("空欄の名義はサービスを呼ぶ前に弾く", async () => {
        // Act
        const prompter = await runCli(["1", "   ", "8"]);

        // Assert
        expect(prompter.lines).toContain("Error: Name cannot be empty.");
        expect(prompter.questions).not.toContain("Enter a 4-digit PIN: ");
    });

    // ===== 一連のシナリオ =====

    it("開設 → 入金 → 出金 → 照会 → 削除拒否 → 全額出金 → 削除 の一連の流れ", async () => {
        // Arrange
        const [number = ""] = expectedAccountNumbers(1);

        // Act
        const prompter = await runCli([
            "1", "John Doe", "1234",
            "4", number, "1000.50",
            "5", number, "1234", "300.75",
            "7", number, "1234",
            "3", number, "John Doe", "1234",
            "5", number, "1234", "699.75",
            "3", number, "John Doe", "1234", "y",
            "7", number, "1234",
            "8",
        ]);

        // Assert
        const messages = prompter.lines.filter((line) => !/^(\d\. |--- |$)/.test(line));
        expect(messages).toEqual([
            `Account created successfully! Account Number: ${number}`,
            "Successfully deposited $1000.50!",
            "Successfully withdrew $300.75!",
            `Account Number: ${number}`,
            "Account Holder: John Doe",
            "Current Balance: $699.75",
            "Cannot delete account with non-zero balance. Current balance: $699.75",
            "Please withdraw all funds before deleting the account.",
            "Successfully withdrew $699.75!",
            "Account deleted successfully!",
            "Account not found or incorrect PIN.",
            "Application exiting. Goodbye!",
        ]);
        expect(prompter.questions).toContain("Are you sure you want to delete the account for John Doe? (y/N): ");
    });

    it("削除の確認で y 以外を答えると削除しない", async () => {
        // Arrange
        const [number = ""] = expectedAccountNumbers(1);

        // Act
        const prompter = await runCli([
            "1", "John Doe", "1234",
            "3", number, "John Doe", "1234", "n",
            "7", number, "1234",
            "8",
        ]);

        // Assert
        expect(prompter.lines).toContain("Account deletion cancelled.");
        expect(prompter.lines).toContain("Account Holder: John Doe");
    });

    // ===== 入力エラーと業務エラー =====

    it.each(["abc", "0", "-5", "1.2.3"])("金額 %s は正の金額として受け付けない", async (amount) => {
        // Act
        const prompter = await runCli(["4", "12345678901", amount, "8"]);

        // Assert
        expect(prompter.lines).toContain("Error: Please enter a valid positive amount.");
    });

    it("同じ口座への送金は金額を聞く前に断る", async () => {
        // Act
        const prompter = await runCli(["6", "12345678901", "1234", "12345678901", "8"]);

        // Assert
        expect(prompter.lines).toContain("Error: Cannot transfer to the same account.");
        expect(prompter.questions).not.toContain("Enter amount to transfer: $");
    });

    it("コマンドの検証エラーは 'Error <操作>: <メッセージ>' で表示する", async () => {
        // Act
        const prompter = await runCli(["5", "123", "1234", "10", "8"]);

        // Assert
        expect(prompter.lines).toContain("Error withdrawing funds: Account number must be 11 digits long");
    });

    it("残高不足の送金はエラーを表示し、残高は変わらない", async () => {
        // Arrange
        const [alice = "", bob = ""] = expectedAccountNumbers(2);

        // Act
        const prompter = await runCli([
            "1", "Alice", "1111",
            "1", "Bob", "2222",
            "4", alice, "10",
            "6", alice, "1111", bob, "10.01",
            "6", alice, "1111", bob, "4.50",
            "7", bob, "2222",
            "8",
        ]);

        // Assert
        expect(prompter.lines).toContain("Error transferring funds: Insufficient funds");
        expect(prompter.lines).toContain(`Successfully transferred $4.50 from ${alice} to ${bob}!`);
        expect(prompter.lines).toContain("Current Balance: $4.50");
    });

    // ===== 保存 =====

    it("保存に失敗してもメッセージを表示して続行する", async () => {
        // Arrange
        const failingPort: SaveBankStatePort = {
            saveBankState: vi.fn().mockRejectedValue(
                new PersistenceException("PERMISSION_DENIED", "Permission denied when writing to data files.")
            ),
        };
        container.register(SaveBankStatePortToken, {useValue: failingPort});

        // Act
        const prompter = await runCli(["9", "8"]);

        // Assert
        expect(prompter.lines.filter((line) => line.startsWith("Error saving data"))).toEqual([
            "Error saving data: Permission denied when writing to data files.",
            "Error saving data: Permission denied when writing to data files.",
        ]);
        expect(prompter.lines.at(-1)).toBe("Application exiting. Goodbye!");
        expect(failingPort.saveBankState).toHaveBeenCalledTimes(2);
    });
});
