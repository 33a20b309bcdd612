/**
 * DI用のトークン
 */
export const BankToken = Symbol('Bank');
export const AppEnvironmentToken = Symbol('AppEnvironment');
