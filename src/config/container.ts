/**
 * DIコンテナ設定ファイル
 *
 * 環境変数（AppEnvironment）から、保存方式・保存先・乱数のシードを決めて組み立てる。
 * ポートとユースケースは useToken で実装クラスの登録を指すので、
 * テストでは1つのトークンだけを差し替えられる。
 *
 * 【登録するもの】
 * 1. 保存先・乱数源・時計・ID発行（設定値と共通部品）
 * 2. Bank 集約（プロセス全体で1つ）
 * 3. 永続化アダプター（JSONファイル または インメモリ）
 * 4. アプリケーションサービス（3つのユースケースの実装）
 */

import 'reflect-metadata'; // tsyringe が必要とするメタデータ機能を有効化
import {container, instanceCachingFactory} from 'tsyringe';
import {DataFileSystemToken, NodeDataFileSystem} from '../bank/adapter/out/persistence/DataFileSystem';
import {InMemoryBankStateAdapter} from '../bank/adapter/out/persistence/InMemoryBankStateAdapter';
import {JsonFileBankStateAdapter} from '../bank/adapter/out/persistence/JsonFileBankStateAdapter';
import {Bank} from '../bank/application/domain/model/Bank';
import {AccountNumberGenerator} from '../bank/application/domain/service/AccountNumberGenerator';
import {AccountLifecycleUseCaseToken} from '../bank/application/port/in/AccountLifecycleUseCase';
import {BankDataUseCaseToken} from '../bank/application/port/in/BankDataUseCase';
import {MoneyMovementUseCaseToken} from '../bank/application/port/in/MoneyMovementUseCase';
import type {BankStateLocation} from '../bank/application/port/out/BankStateLocation';
import {BankStateLocationToken} from '../bank/application/port/out/BankStateLocation';
import {LoadBankStatePortToken} from '../bank/application/port/out/LoadBankStatePort';
import {SaveBankStatePortToken} from '../bank/application/port/out/SaveBankStatePort';
import {BankApplicationService} from '../bank/application/service/BankApplicationService';
import type {IdGenerator} from '../common/id/IdGenerator';
import {IdGeneratorToken, UuidGenerator} from '../common/id/IdGenerator';
import type {RandomSource} from '../common/random/RandomSource';
import {CryptoRandomSource, RandomSourceToken, SeededRandomSource} from '../common/random/RandomSource';
import type {Clock} from '../common/time/Clock';
import {ClockToken, SystemClock} from '../common/time/Clock';
import type {AppEnvironment} from './environment';
import {BankToken} from './types';

// 初期化済みフラグ（複数回初期化を防ぐ）
let isInitialized = false;

/**
 * DIコンテナの初期化と依存関係の登録
 *
 * アプリケーション起動時に一度だけ実行される。
 *
 * @param env 検証済みの環境変数（loadEnvironment の戻り値）
 */
export function setupContainer(env: AppEnvironment): void {
    if (isInitialized) {
        return;
    }

    console.log('🚀 Initializing DI container...');

    // ========================================
    // 1. 設定値と共通部品
    // ========================================

    const location: BankStateLocation = {
        accountsPath: env.BANK_ACCOUNTS_FILE,
        transactionsPath: env.BANK_TRANSACTIONS_FILE,
    };
    container.register(BankStateLocationToken, {useValue: location});

    /**
     * シードが指定されていれば決定的な乱数源を使う（口座番号が毎回同じになる）
     */
    const seed = env.BANK_RANDOM_SEED;
    container.register<RandomSource>(RandomSourceToken, {
        useValue: seed === undefined ? new CryptoRandomSource() : new SeededRandomSource(seed),
    });
    container.register<Clock>(ClockToken, {useValue: new SystemClock()});
    container.register<IdGenerator>(IdGeneratorToken, {useValue: new UuidGenerator()});

    // ========================================
    // 2. Bank 集約
    // ========================================

    /**
     * 【instanceCachingFactory とは？】
     * 初回の resolve でファクトリを実行し、以降は同じインスタンスを返す。
     * Bank は状態（口座と取引）を持つので、必ず1つだけにする。
     */
    container.register<Bank>(BankToken, {
        useFactory: instanceCachingFactory(
            (c) =>
                new Bank(
                    new AccountNumberGenerator(c.resolve<RandomSource>(RandomSourceToken)),
                    c.resolve<Clock>(ClockToken),
                    c.resolve<IdGenerator>(IdGeneratorToken)
                )
        ),
    });

    // ========================================
    // 3. 出力アダプター（永続化層）
    // ========================================

    /**
     * Application層は LoadBankStatePort / SaveBankStatePort にしか依存しない。
     * 実装は BANK_STORAGE で切り替える：
     * - file   → JsonFileBankStateAdapter（2つのJSONファイル）
     * - memory → InMemoryBankStateAdapter（プロセス終了で消える）
     */
    if (env.BANK_STORAGE === 'file') {
        console.log(`📁 Using JSON file adapter (${location.accountsPath}, ${location.transactionsPath})`);

        container.register(DataFileSystemToken, {useClass: NodeDataFileSystem});
        container.registerSingleton(JsonFileBankStateAdapter, JsonFileBankStateAdapter);

        // 1つのAdapterが2つのPortを実装しているので、同じインスタンスを使い回す
        container.register(LoadBankStatePortToken, {useToken: JsonFileBankStateAdapter});
        container.register(SaveBankStatePortToken, {useToken: JsonFileBankStateAdapter});
    } else {
        console.log('💾 Using InMemory adapter');

        container.registerSingleton(InMemoryBankStateAdapter, InMemoryBankStateAdapter);
        container.register(LoadBankStatePortToken, {useToken: InMemoryBankStateAdapter});
        container.register(SaveBankStatePortToken, {useToken: InMemoryBankStateAdapter});
    }

    // ========================================
    // 4. アプリケーションサービス
    // ========================================

    /**
     * 1つのサービスが3つのユースケースを実装している。
     * どのTokenで resolve しても同じインスタンス（同じ Bank）を共有する。
     */
    container.registerSingleton(BankApplicationService, BankApplicationService);
    container.register(AccountLifecycleUseCaseToken, {useToken: BankApplicationService});
    container.register(MoneyMovementUseCaseToken, {useToken: BankApplicationService});
    container.register(BankDataUseCaseToken, {useToken: BankApplicationService});

    isInitialized = true;
    console.log(`✅ DI container initialized (storage: ${env.BANK_STORAGE})`);
}

/**
 * コンテナをリセット（主にテスト用）
 *
 * 登録もキャッシュ済みインスタンスもすべて破棄する。
 */
export function resetContainer(): void {
    container.reset();
    isInitialized = false;
    console.log('🔄 DI container reset');
}

export {container};
