/**
 * DIコンテナ設定ファイル
 *
 * 【tsyringe の基本用語】
 * - Token: 依存オブジェクトを識別するためのキー（通常はSymbol）
 * - register: コンテナに「このTokenならこのクラス/値を使う」というルールを登録
 * - resolve: Tokenを指定して、対応するインスタンスを取得
 * - inject: クラスのコンストラクタで、どの依存が必要かを宣言
 */

import 'reflect-metadata'; // tsyringe が必要とするメタデータ機能を有効化
import {container} from 'tsyringe';
import {NoOpBankLock} from '../account/adapter/out/lock/NoOpBankLock';
import {Account} from '../account/application/domain/model/Account';
import {AccountNumber} from '../account/application/domain/model/AccountNumber';
import {Bank} from '../account/application/domain/model/Bank';
import {Money} from '../account/application/domain/model/Money';
import {CreateAccountUseCaseToken} from '../account/application/port/in/CreateAccountUseCase';
import {GetAccountBalanceQueryToken} from '../account/application/port/in/GetAccountBalanceQuery';
import {ListTransactionsQueryToken} from '../account/application/port/in/ListTransactionsQuery';
import {MakeTransactionUseCaseToken} from '../account/application/port/in/MakeTransactionUseCase';
import {BankLockToken} from '../account/application/port/out/BankLock';
import {BankApplicationService} from '../account/application/service/BankApplicationService';
import type {AppEnvironment} from './environment';
import {AppEnvironmentToken, BankToken} from './types';

// 初期化済みフラグ（複数回初期化を防ぐ）
let isInitialized = false;

/**
 * DIコンテナの初期化と依存関係の登録
 *
 * 【処理の流れ】
 * 1. 環境設定の登録
 * 2. Bank 集約の生成と登録（必要ならデモ口座を登録）
 * 3. 銀行ロックの登録
 * 4. アプリケーションサービス（UseCase実装）の登録
 *
 * @param env 検証済みの環境変数
 */
export function setupContainer(env: AppEnvironment): void {
    if (isInitialized) {
        return;
    }

    console.log('🚀 Initializing DI container...');

    // ========================================
    // 1. 環境設定の登録
    // ========================================
    container.register(AppEnvironmentToken, {
        useValue: env,
    });

    // ========================================
    // 2. Bank 集約
    // ========================================

    /**
     * Bank はプロセス全体のシングルトンではなく、コンテナの初期化ごとに1つ作る。
     * 口座と台帳の寿命はこのインスタンスの寿命と同じ（プロセス終了で消える）。
     */
    const bank = new Bank();

    if (env.SEED_DEMO_ACCOUNTS) {
        seedDemoAccounts(bank);
    }

    container.register(BankToken, {
        useValue: bank,
    });

    // ========================================
    // 3. 銀行ロック機構の登録
    // ========================================

    /**
     * 単一プロセス・シングルスレッドなので NoOpBankLock で十分。
     * 複数プロセスから同じ Bank を扱うなら、ここを差し替える。
     */
    container.register(BankLockToken, {
        useClass: NoOpBankLock,
    });

    // ========================================
    // 4. アプリケーションサービスの登録
    // ========================================

    /**
     * 1つのサービスが4つの入力ポートを実装しているので、
     * 各トークンを useToken で同じシングルトンに向ける。
     */
    container.registerSingleton(BankApplicationService, BankApplicationService);

    container.register(CreateAccountUseCaseToken, {
        useToken: BankApplicationService,
    });

    container.register(MakeTransactionUseCaseToken, {
        useToken: BankApplicationService,
    });

    container.register(GetAccountBalanceQueryToken, {
        useToken: BankApplicationService,
    });

    container.register(ListTransactionsQueryToken, {
        useToken: BankApplicationService,
    });

    isInitialized = true;
    console.log(`✅ DI container initialized (demo accounts: ${env.SEED_DEMO_ACCOUNTS ? 'seeded' : 'none'})`);
}

/**
 * デモ用の口座を登録
 *
 * - 1: Alice（普通預金）残高 100.00
 * - 2: Bob（当座預金）残高 0.00
 */
function seedDemoAccounts(bank: Bank): void {
    bank.addAccount(Account.savings(new AccountNumber(1), 'Alice', Money.of('100.00')));
    bank.addAccount(Account.checking(new AccountNumber(2), 'Bob', Money.of('0.00')));

    console.log(`🌱 Seeded ${String(bank.getAccountCount())} demo accounts`);
}

/**
 * コンテナをリセット（主にテスト用）
 *
 * useValue で登録した Bank も破棄されるので、
 * 次の setupContainer() では空の Bank から始まる。
 */
export function resetContainer(): void {
    container.clearInstances();
    isInitialized = false;
    console.log('🔄 DI container reset');
}

export {container};
