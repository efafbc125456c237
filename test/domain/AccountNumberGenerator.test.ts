import {describe, expect, it} from "vitest";
import {AccountNumberGenerator} from "../../src/bank/application/domain/service/AccountNumberGenerator";
import type {RandomSource} from "../../src/common/random/RandomSource";
import {CryptoRandomSource, SeededRandomSource} from "../../src/common/random/RandomSource";

describe("AccountNumberGenerator", () => {
    it("11桁の数字列を返す", () => {
        // Arrange
        const generator = new AccountNumberGenerator(new CryptoRandomSource());

        // Act
        const accountNumber = generator.generate(() => false);

        // Assert
        expect(accountNumber).toMatch(/^\d{11}$/);
    });

    it("1000件採番しても重複しない", () => {
        // Arrange
        const generator = new AccountNumberGenerator(new SeededRandomSource(7));
        const issued = new Set<string>();

        // Act
        for (let i = 0; i < 1000; i++) {
            issued.add(generator.generate((candidate) => issued.has(candidate)));
        }

        // Assert
        expect(issued.size).toBe(1000);
        for (const accountNumber of issued) {
            expect(accountNumber).toMatch(/^\d{11}$/);
        }
    });

    it("既存の番号と衝突したら引き直す", () => {
        // Arrange
        // 最初の11回は 1、以降は 2 を返す乱数源
        let calls = 0;
        const random: RandomSource = {
            nextInt: () => {
                calls += 1;
                return calls <= 11 ? 1 : 2;
            },
        };
        const generator = new AccountNumberGenerator(random);

        // Act
        const accountNumber = generator.generate((candidate) => candidate === "11111111111");

        // Assert
        expect(accountNumber).toBe("22222222222");
        expect(calls).toBe(22);
    });

    it("同じシードからは同じ番号が得られる", () => {
        // Arrange
        const first = new AccountNumberGenerator(new SeededRandomSource(42));
        const second = new AccountNumberGenerator(new SeededRandomSource(42));

        // Act & Assert
        expect(first.generate(() => false)).toBe(second.generate(() => false));
    });
});
