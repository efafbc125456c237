import "reflect-metadata"

import {mkdtemp, rm, writeFile} from "node:fs/promises";
import {tmpdir} from "node:os";
import {join} from "node:path";
import {afterEach, beforeEach, describe, expect, it, vi} from "vitest";
import type {AccountLifecycleUseCase} from "../../src/bank/application/port/in/AccountLifecycleUseCase";
import {AccountLifecycleUseCaseToken} from "../../src/bank/application/port/in/AccountLifecycleUseCase";
import {GetAccountDetailsQuery} from "../../src/bank/application/port/in/GetAccountDetailsQuery";
import {initializeApplication} from "../../src/config/app-initializer";
import {container, resetContainer} from "../../src/config/container";
import {loadEnvironment} from "../../src/config/environment";

/**
 * 起動処理の統合テスト（JSONファイル保存・一時ディレクトリ）
 */
describe("initializeApplication", () => {
    let directory: string;
    let accountsPath: string;

    beforeEach(async () => {
        directory = await mkdtemp(join(tmpdir(), "pin-ledger-init-"));
        accountsPath = join(directory, "accounts.json");
        vi.spyOn(console, "log").mockImplementation(() => undefined);
        vi.spyOn(console, "error").mockImplementation(() => undefined);
    });

    afterEach(async () => {
        resetContainer();
        vi.restoreAllMocks();
        await rm(directory, {recursive: true, force: true});
    });

    function environment() {
        return loadEnvironment({
            BANK_ACCOUNTS_FILE: accountsPath,
            BANK_TRANSACTIONS_FILE: join(directory, "transactions.json"),
        });
    }

    it("保存済みの口座を読み込む", async () => {
        // Arrange
        await writeFile(
            accountsPath,
            JSON.stringify([{Name: "Jane Roe", AccountNumber: "12345678901", Pin: "4321", Balance: 12.5}]),
            "utf8"
        );

        // Act
        await initializeApplication(environment());

        // Assert
        expect(vi.mocked(console.log)).toHaveBeenCalledWith("Bank data loaded successfully.");
        const useCase = container.resolve<AccountLifecycleUseCase>(AccountLifecycleUseCaseToken);
        const account = useCase.getAccountDetails(new GetAccountDetailsQuery("12345678901", "4321"));
        expect(account?.getBalance().toString()).toBe("12.50");
    });

    it("読み込みに失敗したら、エラーを表示して空の状態で始める", async () => {
        // Arrange
        await writeFile(accountsPath, "not json", "utf8");

        // Act
        await initializeApplication(environment());

        // Assert
        expect(vi.mocked(console.error)).toHaveBeenCalledTimes(1);
        expect(String(vi.mocked(console.error).mock.calls[0]?.[0])).toMatch(
            new RegExp(`^Error loading bank data: Malformed data in ${escapeRegExp(accountsPath)}: `)
        );
        expect(vi.mocked(console.log)).toHaveBeenCalledWith("Starting with an empty bank data.");
        expect(vi.mocked(console.log)).not.toHaveBeenCalledWith("Bank data loaded successfully.");
    });
});

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
