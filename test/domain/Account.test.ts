import {describe, expect, it} from "vitest";
import {InsufficientBalanceException} from "../../src/bank/application/domain/exception/InsufficientBalanceException";
import {InvalidArgumentException} from "../../src/bank/application/domain/exception/InvalidArgumentException";
import {Account} from "../../src/bank/application/domain/model/Account";
import {Money} from "../../src/bank/application/domain/model/Money";

describe("Account", () => {
    const validNumber = "12345678901";

    // ===== 生成と検証 =====

    it("正しい値で生成できる", () => {
        // Arrange & Act
        const account = new Account("John Doe", validNumber, "1234", Money.of(100));

        // Assert
        expect(account.getName()).toBe("John Doe");
        expect(account.getAccountNumber()).toBe(validNumber);
        expect(account.getPin()).toBe("1234");
        expect(account.getBalance().toString()).toBe("100.00");
    });

    it("名義が空なら生成できない", () => {
        // Act & Assert
        expect(() => new Account("", validNumber, "1234", Money.ZERO)).toThrow(
            "Name cannot be null or empty."
        );
    });

    it.each(["123", "1234567890", "123456789012", "1234567890a"])(
        "口座番号 %s は11桁の数字でないので拒否する",
        (accountNumber) => {
            // Act & Assert
            expect(() => new Account("John Doe", accountNumber, "1234", Money.ZERO)).toThrow(
                "Account number must be an 11-digit string."
            );
        }
    );

    it("名義と口座番号が両方不正なら、名義のエラーが先に出る", () => {
        // Act & Assert
        expect(() => new Account("", "123", "1234", Money.ZERO)).toThrow(
            "Name cannot be null or empty."
        );
    });

    it("PINが空なら生成できない", () => {
        // Act & Assert
        expect(() => new Account("John Doe", validNumber, "", Money.ZERO)).toThrow(
            "Pin cannot be null or empty."
        );
    });

    it("負の残高では生成できない", () => {
        // Act & Assert
        expect(() => new Account("John Doe", validNumber, "1234", Money.of(-1))).toThrow(
            InvalidArgumentException
        );
        expect(() => new Account("John Doe", validNumber, "1234", Money.of(-1))).toThrow(
            "Balance cannot be negative."
        );
    });

    // ===== 入出金 =====

    it("入金すると残高が増える", () => {
        // Arrange
        const account = new Account("John Doe", validNumber, "1234", Money.of(10));

        // Act
        account.deposit(Money.of("0.50"));

        // Assert
        expect(account.getBalance().toString()).toBe("10.50");
    });

    it("残高ちょうどの出金はできる", () => {
        // Arrange
        const account = new Account("John Doe", validNumber, "1234", Money.of(10));

        // Act
        account.withdraw(Money.of(10));

        // Assert
        expect(account.hasZeroBalance()).toBe(true);
    });

    it("残高を超える出金は失敗し、残高は変わらない", () => {
        // Arrange
        const account = new Account("John Doe", validNumber, "1234", Money.of(10));

        // Act
        const withdraw = () => account.withdraw(Money.of("10.01"));

        // Assert
        expect(withdraw).toThrow(InsufficientBalanceException);
        expect(account.getBalance().toString()).toBe("10.00");
    });

    // ===== 照合と変更 =====

    it("PINと名義を照合できる", () => {
        // Arrange
        const account = new Account("John Doe", validNumber, "1234", Money.ZERO);

        // Act & Assert
        expect(account.matchesPin("1234")).toBe(true);
        expect(account.matchesPin("0000")).toBe(false);
        expect(account.matchesName("John Doe")).toBe(true);
        expect(account.matchesName("john doe")).toBe(false);
    });

    it("名義を変更できるが、空の名義にはできない", () => {
        // Arrange
        const account = new Account("John Doe", validNumber, "1234", Money.ZERO);

        // Act
        account.rename("Jane Doe");

        // Assert
        expect(account.getName()).toBe("Jane Doe");
        expect(() => account.rename("")).toThrow("Name cannot be null or empty.");
        expect(account.getName()).toBe("Jane Doe");
    });

    it("複製への変更は元の口座に影響しない", () => {
        // Arrange
        const account = new Account("John Doe", validNumber, "1234", Money.of(5));
        const copy = account.copy();

        // Act
        copy.deposit(Money.of(5));
        copy.rename("Someone Else");

        // Assert
        expect(account.getBalance().toString()).toBe("5.00");
        expect(account.getName()).toBe("John Doe");
    });
});
