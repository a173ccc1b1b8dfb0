/**
 * 反检测注入脚本
 *
 * 在每个文档加载前执行：
 * - navigator.webdriver 返回 false
 * - 语言列表与上下文 locale 一致
 * - Canvas 读回像素加入 ±1 噪声
 * - 通知/剪贴板权限查询返回 prompt
 * - 补齐 window.chrome
 */

export interface StealthScriptConfig {
    languages: string[];
    /** 每个通道的最大扰动值 */
    canvasNoise: number;
    permissionsAsPrompt: string[];
}

export const DEFAULT_PROMPT_PERMISSIONS = ['notifications', 'clipboard-read', 'clipboard-write'];

/**
 * 由 locale 推导 navigator.languages
 */
export function languagesForLocale(locale: string): string[] {
    const base = locale.split('-')[0];
    return Array.from(new Set([locale, base, 'en-US', 'en']));
}

export function buildStealthScript(config: StealthScriptConfig): string {
    return `
        (function() {
            'use strict';

            const config = ${JSON.stringify(config)};

            // ============ webdriver ============
            Object.defineProperty(navigator, 'webdriver', {
                get: () => false,
                configurable: true
            });

            // ============ 语言伪装 ============
            if (config.languages.length > 0) {
                Object.defineProperty(navigator, 'languages', {
                    get: () => config.languages,
                    configurable: true
                });
                Object.defineProperty(navigator, 'language', {
                    get: () => config.languages[0],
                    configurable: true
                });
            }

            // ============ Canvas 指纹伪装 ============
            if (config.canvasNoise > 0) {
                const originalGetImageData = CanvasRenderingContext2D.prototype.getImageData;
                CanvasRenderingContext2D.prototype.getImageData = function(...args) {
                    const imageData = originalGetImageData.apply(this, args);
                    const data = imageData.data;
                    for (let i = 0; i < data.length; i += 4) {
                        for (let j = 0; j < 3; j++) {
                            const noise = Math.floor(Math.random() * (config.canvasNoise * 2 + 1)) - config.canvasNoise;
                            data[i + j] = Math.max(0, Math.min(255, data[i + j] + noise));
                        }
                    }
                    return imageData;
                };
            }

            // ============ 权限查询 ============
            if (navigator.permissions && navigator.permissions.query) {
                const originalQuery = navigator.permissions.query.bind(navigator.permissions);
                navigator.permissions.query = (parameters) => {
                    if (parameters && config.permissionsAsPrompt.includes(parameters.name)) {
                        return Promise.resolve({ state: 'prompt', name: parameters.name, onchange: null });
                    }
                    return originalQuery(parameters);
                };
            }

            // ============ chrome 对象 ============
            if (!window.chrome) {
                window.chrome = { runtime: {} };
            } else if (!window.chrome.runtime) {
                window.chrome.runtime = {};
            }
        })();
    `;
}
