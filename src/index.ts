import 'reflect-metadata';
import {config} from 'dotenv';
import {BankCli} from './bank/adapter/in/cli/BankCli';
import {ConsolePrompter} from './bank/adapter/in/cli/ConsolePrompter';
import {PrompterToken} from './bank/adapter/in/cli/Prompter';
import {initializeApplication} from './config/app-initializer';
import {container} from './config/container';
import {loadEnvironment} from './config/environment';

/**
 * エントリポイント
 *
 * 1. .env を読み込み、環境変数を検証する
 * 2. DIコンテナを設定し、保存済みデータを読み込む
 * 3. 対話型メニューを実行する
 */
async function main(): Promise<void> {
    // .envファイルがあれば読み込む（無ければ何もしない）
    config();

    const env = loadEnvironment();
    await initializeApplication(env);

    const prompter = new ConsolePrompter();
    container.register(PrompterToken, {useValue: prompter});

    try {
        await container.resolve(BankCli).run();
    } finally {
        prompter.close();
    }
}

main().catch((error: unknown) => {
    console.error('💥 Fatal error:', error);
    process.exitCode = 1;
});
