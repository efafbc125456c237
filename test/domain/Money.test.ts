import {describe, expect, it} from "vitest";
import {InvalidArgumentException} from "../../src/bank/application/domain/exception/InvalidArgumentException";
import {Money} from "../../src/bank/application/domain/model/Money";

describe("Money", () => {
    // ===== 生成 =====

    it("数値から生成でき、表示は小数第2位まで", () => {
        // Arrange & Act
        const money = Money.of(1000.5);

        // Assert
        expect(money.toDecimalString()).toBe("1000.5");
        expect(money.toString()).toBe("1000.50");
    });

    it("文字列から生成できる", () => {
        // Arrange & Act
        const money = Money.of("300.75");

        // Assert
        expect(money.toDecimalString()).toBe("300.75");
    });

    it("小数第3位以降も失わずに保持する", () => {
        // Arrange & Act
        const money = Money.of("0.005");

        // Assert
        expect(money.isPositive()).toBe(true);
        expect(money.toDecimalString()).toBe("0.005");
        expect(money.plus(Money.of("10.12")).toDecimalString()).toBe("10.125");
    });

    it("指数表記も受け付ける", () => {
        // Act & Assert
        expect(Money.of("1e+21").toDecimalString()).toBe("1000000000000000000000");
        expect(Money.of("2.5E-3").toDecimalString()).toBe("0.0025");
    });

    it("2^53 セントを超える金額も正確に保持する", () => {
        // Arrange & Act
        const money = Money.of("90071992547409.93");

        // Assert
        expect(money.toDecimalString()).toBe("90071992547409.93");
        expect(money.toString()).toBe("90071992547409.93");
    });

    it("bigintは主単位として扱う", () => {
        // Arrange & Act
        const money = Money.of(10n);

        // Assert
        expect(money.toString()).toBe("10.00");
    });

    it("ZERO定数は0", () => {
        // Act & Assert
        expect(Money.ZERO.isZero()).toBe(true);
        expect(Money.ZERO.toString()).toBe("0.00");
        expect(Money.ZERO.toDecimalString()).toBe("0");
    });

    // ===== 不正な値 =====

    it("小数第29位以降を持つ値は拒否する", () => {
        // Arrange
        const tooPrecise = `0.${"0".repeat(28)}1`;

        // Act & Assert
        expect(() => Money.of(tooPrecise)).toThrow(InvalidArgumentException);
        expect(() => Money.of(tooPrecise)).toThrow(
            `Amount must not have more than 28 decimal places: ${tooPrecise}`
        );
    });

    it("小数第29位以降が0だけなら受け付ける", () => {
        // Act & Assert
        expect(Money.of(`1.${"0".repeat(30)}`).equals(Money.of(1))).toBe(true);
    });

    it("有限でない数値は拒否する", () => {
        // Act & Assert
        expect(() => Money.of(Number.NaN)).toThrow("Amount must be a finite number: NaN");
        expect(() => Money.of(Number.POSITIVE_INFINITY)).toThrow(
            "Amount must be a finite number: Infinity"
        );
    });

    it("10進表記でない文字列は拒否する", () => {
        // Act & Assert
        expect(() => Money.of("abc")).toThrow("Amount is not a valid decimal number: abc");
        expect(() => Money.of("")).toThrow("Amount is not a valid decimal number: ");
    });

    // ===== 演算 =====

    it("加算と減算で丸め誤差が出ない", () => {
        // Arrange
        const a = Money.of(0.1);
        const b = Money.of(0.2);

        // Act
        const sum = a.plus(b);

        // Assert
        expect(sum.equals(Money.of("0.3"))).toBe(true);
    });

    it("1000.50 から 300.75 を引くと 699.75", () => {
        // Act
        const result = Money.of("1000.50").minus(Money.of("300.75"));

        // Assert
        expect(result.toString()).toBe("699.75");
        expect(result.toDecimalString()).toBe("699.75");
    });

    it("負の値は先頭にマイナスが付く", () => {
        // Act
        const result = Money.of(2).minus(Money.of(5));

        // Assert
        expect(result.isNegative()).toBe(true);
        expect(result.toString()).toBe("-3.00");
        expect(result.toDecimalString()).toBe("-3");
    });

    it("表示は小数第3位で四捨五入する", () => {
        // Act & Assert
        expect(Money.of("10.125").toString()).toBe("10.13");
        expect(Money.of("10.124").toString()).toBe("10.12");
        expect(Money.of("-0.005").toString()).toBe("-0.01");
        expect(Money.of("-0.004").toString()).toBe("0.00");
    });

    // ===== 比較 =====

    it("大小を比較できる", () => {
        // Arrange
        const small = Money.of(10);
        const large = Money.of("10.01");

        // Act & Assert
        expect(large.isGreaterThan(small)).toBe(true);
        expect(small.isGreaterThan(large)).toBe(false);
        expect(small.isGreaterThanOrEqualTo(Money.of("10.00"))).toBe(true);
        expect(small.isPositive()).toBe(true);
    });
});
