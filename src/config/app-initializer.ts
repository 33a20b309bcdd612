import { setupContainer } from './container'
import type { AppEnvironment } from './environment'

/**
 * アプリケーション全体の初期化
 *
 * 【責務】
 * 1. DIコンテナの設定（setupContainer）
 * 2. 将来、他のコンテキストが増えたらここで初期化する
 */

let isInitialized = false

export function initializeApplication(env: AppEnvironment): void {
    if (isInitialized) {
        return
    }

    console.log('🚀 Initializing application...')

    setupContainer(env)

    isInitialized = true
    console.log('✅ Application initialized')
}

export function isApplicationInitialized(): boolean {
    return isInitialized
}

export function resetApplication(): void {
    isInitialized = false
    console.log('🔄 Application reset')
}
