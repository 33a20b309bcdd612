import type { AddAccountOutcome } from '../../domain/model/Bank';
import type { CreateAccountCommand } from './CreateAccountCommand';

/**
 * 口座開設ユースケースのインターフェース（入力ポート）
 */
export interface CreateAccountUseCase {
    /**
     * 口座を開設して銀行に登録
     *
     * @returns 登録結果（口座番号が重複していれば DUPLICATE_ACCOUNT_NUMBER）
     */
    createAccount(command: CreateAccountCommand): AddAccountOutcome;
}

/**
 * DI用のシンボル
 */
export const CreateAccountUseCaseToken = Symbol('CreateAccountUseCase');
