import {container} from 'tsyringe';
import type {BankDataUseCase} from '../bank/application/port/in/BankDataUseCase';
import {BankDataUseCaseToken} from '../bank/application/port/in/BankDataUseCase';
import {setupContainer} from './container';
import type {AppEnvironment} from './environment';

/**
 * アプリケーション全体の初期化
 *
 * 【責務】
 * 1. DIコンテナの設定（setupContainer）
 * 2. 保存済みデータの読み込み
 *
 * 読み込みに失敗しても起動は続ける（空の銀行から始める）。
 */
export async function initializeApplication(env: AppEnvironment): Promise<void> {
    console.log('🚀 Initializing application...');

    setupContainer(env);

    const bankData = container.resolve<BankDataUseCase>(BankDataUseCaseToken);
    try {
        await bankData.loadData();
        console.log('Bank data loaded successfully.');
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`Error loading bank data: ${message}`);
        console.log('Starting with an empty bank data.');
    }

    console.log('✅ Application initialized');
}
