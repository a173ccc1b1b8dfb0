/**
 * HumanBehavior 单元测试
 */

import { describe, expect, test, vi } from 'vitest';
import { HumanBehavior, type PointerPage } from '../../core/human-behavior';

function createPointerPage() {
  return {
    mouse: {
      move: vi.fn().mockResolvedValue(undefined),
      wheel: vi.fn().mockResolvedValue(undefined),
    },
  } satisfies PointerPage;
}

describe('HumanBehavior', () => {
  test('generateBezierPath should end exactly at the target', () => {
    const behavior = new HumanBehavior({ random: () => 0.5 });

    const path = behavior.generateBezierPath(0, 0, 100, 100, 4);

    expect(path).toHaveLength(4);
    expect(path[3]).toEqual({ x: 100, y: 100 });
  });

  test('browse should use the minimum counts for a low random source', async () => {
    const page = createPointerPage();
    const delay = vi.fn().mockResolvedValue(undefined);
    const behavior = new HumanBehavior({ random: () => 0, delay });

    const summary = await behavior.browse(page, { width: 1366, height: 768 });

    expect(summary).toEqual({ mouseMoves: 2, scrolls: 2, scrolledBack: true });
    expect(page.mouse.move).toHaveBeenCalledTimes(6);
    expect(page.mouse.wheel.mock.calls).toEqual([[{ deltaY: 100 }], [{ deltaY: 100 }], [{ deltaY: -100 }]]);
    expect(delay).toHaveBeenCalledTimes(4);
    expect(delay).toHaveBeenCalledWith(100);
  });

  test('browse should not scroll back for a high random source', async () => {
    const page = createPointerPage();
    const behavior = new HumanBehavior({ random: () => 0.99, delay: async () => undefined });

    const summary = await behavior.browse(page, { width: 800, height: 600 });

    expect(summary.scrolledBack).toBe(false);
    expect(summary.mouseMoves).toBe(5);
    expect(summary.scrolls).toBe(5);
    expect(page.mouse.wheel).toHaveBeenCalledTimes(5);
  });

  test('browse should honour a partial config override', async () => {
    const page = createPointerPage();
    const behavior = new HumanBehavior({
      random: () => 0,
      delay: async () => undefined,
      config: { mouseMoves: { min: 0, max: 0 }, scrolls: { min: 1, max: 1 }, scrollBackChance: 0 },
    });

    const summary = await behavior.browse(page, { width: 800, height: 600 });

    expect(summary).toEqual({ mouseMoves: 0, scrolls: 1, scrolledBack: false });
    expect(page.mouse.move).not.toHaveBeenCalled();
  });
});
