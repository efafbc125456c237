/**
 * 対話入出力の抽象
 *
 * BankCli はこのインターフェース越しにだけ入出力する。
 * テストでは、あらかじめ用意した回答を順に返す実装に差し替える。
 */
export interface Prompter {
    /**
     * 質問を表示して1行読む
     *
     * @returns 入力された行。入力が終わっている（EOF）場合は null
     */
    ask(question: string): Promise<string | null>;

    print(line: string): void;
}

/**
 * DI用のシンボル
 */
export const PrompterToken = Symbol('Prompter');
