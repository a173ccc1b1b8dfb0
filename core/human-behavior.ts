/**
 * HumanBehavior - 人性化行为模拟模块
 *
 * 页面加载后模拟少量真人操作：
 * - 贝塞尔曲线鼠标轨迹
 * - 滚轮滚动，偶尔回滚
 */

import { sleep } from '../utils/retry';

// 随机整数
function randomInt(min: number, max: number, random: () => number): number {
    return Math.floor(random() * (max - min + 1)) + min;
}

// 随机浮点数
function randomFloat(min: number, max: number, random: () => number): number {
    return random() * (max - min) + min;
}

/**
 * 只依赖鼠标的页面接口，Puppeteer Page 满足它
 */
export interface PointerPage {
    mouse: {
        move(x: number, y: number, options?: { steps?: number }): Promise<void>;
        wheel(options?: { deltaX?: number; deltaY?: number }): Promise<void>;
    };
}

export interface HumanBehaviorConfig {
    mouseMoves: { min: number; max: number };
    mouseSteps: { min: number; max: number };
    scrolls: { min: number; max: number };
    scrollDistance: { min: number; max: number };
    scrollBackChance: number;
    pause: { min: number; max: number };
}

// 默认配置 - 模拟普通用户行为
export const DEFAULT_HUMAN_CONFIG: HumanBehaviorConfig = {
    mouseMoves: { min: 2, max: 5 },
    mouseSteps: { min: 3, max: 10 },
    scrolls: { min: 2, max: 5 },
    scrollDistance: { min: 100, max: 800 },
    scrollBackChance: 0.3,
    pause: { min: 100, max: 400 },
};

export interface HumanBehaviorOptions {
    config?: Partial<HumanBehaviorConfig>;
    random?: () => number;
    delay?: (ms: number) => Promise<void>;
}

export interface BrowseSummary {
    mouseMoves: number;
    scrolls: number;
    scrolledBack: boolean;
}

export class HumanBehavior {
    private config: HumanBehaviorConfig;
    private readonly random: () => number;
    private readonly delay: (ms: number) => Promise<void>;
    private lastMousePosition: { x: number; y: number } = { x: 0, y: 0 };

    constructor(options: HumanBehaviorOptions = {}) {
        this.config = { ...DEFAULT_HUMAN_CONFIG, ...options.config };
        this.random = options.random ?? Math.random;
        this.delay = options.delay ?? sleep;
    }

    /**
     * 生成贝塞尔曲线路径点
     */
    generateBezierPath(
        startX: number, startY: number,
        endX: number, endY: number,
        steps: number
    ): Array<{ x: number; y: number }> {
        const points: Array<{ x: number; y: number }> = [];
        const r = this.random;

        // 控制点加随机偏移
        const ctrlX1 = startX + (endX - startX) * randomFloat(0.2, 0.4, r) + randomFloat(-50, 50, r);
        const ctrlY1 = startY + (endY - startY) * randomFloat(0.1, 0.3, r) + randomFloat(-30, 30, r);
        const ctrlX2 = startX + (endX - startX) * randomFloat(0.6, 0.8, r) + randomFloat(-50, 50, r);
        const ctrlY2 = startY + (endY - startY) * randomFloat(0.7, 0.9, r) + randomFloat(-30, 30, r);

        for (let i = 1; i <= steps; i++) {
            const t = i / steps;
            const mt = 1 - t;

            // 三次贝塞尔曲线公式
            const x = mt ** 3 * startX + 3 * mt ** 2 * t * ctrlX1 + 3 * mt * t ** 2 * ctrlX2 + t ** 3 * endX;
            const y = mt ** 3 * startY + 3 * mt ** 2 * t * ctrlY1 + 3 * mt * t ** 2 * ctrlY2 + t ** 3 * endY;

            points.push({ x: Math.round(x), y: Math.round(y) });
        }

        return points;
    }

    /**
     * 模拟鼠标移动（贝塞尔曲线轨迹）
     */
    async moveMouse(page: PointerPage, targetX: number, targetY: number): Promise<void> {
        const { mouseSteps } = this.config;
        const steps = randomInt(mouseSteps.min, mouseSteps.max, this.random);
        const path = this.generateBezierPath(
            this.lastMousePosition.x,
            this.lastMousePosition.y,
            targetX,
            targetY,
            steps
        );

        for (const point of path) {
            await page.mouse.move(point.x, point.y);
        }

        this.lastMousePosition = { x: targetX, y: targetY };
    }

    /**
     * 滚轮滚动，distance 为负时向上
     */
    async scroll(page: PointerPage, distance: number): Promise<void> {
        await page.mouse.wheel({ deltaY: distance });
    }

    /**
     * 加载后的一段随机浏览
     */
    async browse(page: PointerPage, viewport: { width: number; height: number }): Promise<BrowseSummary> {
        const { mouseMoves, scrolls, scrollDistance, scrollBackChance, pause } = this.config;
        const r = this.random;

        const moveCount = randomInt(mouseMoves.min, mouseMoves.max, r);
        for (let i = 0; i < moveCount; i++) {
            const x = randomInt(0, Math.max(0, viewport.width - 1), r);
            const y = randomInt(0, Math.max(0, viewport.height - 1), r);
            await this.moveMouse(page, x, y);
            await this.delay(randomInt(pause.min, pause.max, r));
        }

        const scrollCount = randomInt(scrolls.min, scrolls.max, r);
        let total = 0;
        for (let i = 0; i < scrollCount; i++) {
            const distance = randomInt(scrollDistance.min, scrollDistance.max, r);
            await this.scroll(page, distance);
            total += distance;
            await this.delay(randomInt(pause.min, pause.max, r));
        }

        const scrolledBack = r() < scrollBackChance;
        if (scrolledBack) {
            await this.scroll(page, -randomInt(Math.floor(total / 2), total, r));
        }

        return { mouseMoves: moveCount, scrolls: scrollCount, scrolledBack };
    }
}
