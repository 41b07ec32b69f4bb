import { describe, it, expect } from 'vitest';
import { VariantController } from './variant-controller.js';

const options = ['Alpha beta gamma.', 'Delta epsilon zeta.', 'Eta theta iota.'];

describe('VariantController', () => {
  it('cycles through variants before repeating', () => {
    const controller = new VariantController();
    const picks = [1, 2, 3, 4].map(() => controller.chooseVariant(options, 'k'));
    expect(picks).toEqual([options[0], options[1], options[2], options[0]]);
  });

  it('skips a variant too similar to the last response', () => {
    const controller = new VariantController();
    controller.commit('other', 0, 'What feels most present right now?');
    const pick = controller.peek(['What feels most present right now?', 'Something else entirely here.'], 'k');
    expect(pick).toEqual({ index: 1, text: 'Something else entirely here.' });
  });

  it('does not record anything on peek', () => {
    const controller = new VariantController();
    controller.peek(options, 'k');
    expect(controller.snapshot()).toEqual({ usedVariantIndices: {}, recentResponseHistory: [], recentFamilyHistory: [] });
  });

  it('restricts candidates to eligible indices', () => {
    const controller = new VariantController();
    expect(controller.peek(options, 'k', (index) => index === 2)?.index).toBe(2);

    controller.commit('k', 2, options[2] ?? '');
    expect(controller.peek(options, 'k', (index) => index === 2)?.index).toBe(2);
  });

  it('returns undefined for an empty list', () => {
    expect(new VariantController().chooseVariant([], 'k')).toBeUndefined();
  });

  it('cools down families over the window', () => {
    const controller = new VariantController({ familyCooldownWindow: 4 });
    controller.recordFamilyUse('a');
    for (const family of ['b', 'c', 'd']) controller.recordFamilyUse(family);
    expect(controller.canUseFamily('a')).toBe(false);

    controller.recordFamilyUse('e');
    expect(controller.canUseFamily('a')).toBe(true);
  });

  it('bounds its histories', () => {
    const controller = new VariantController({ capacity: 16 });
    for (let i = 0; i < 20; i++) controller.commit('k', i, `response ${i}`);

    const state = controller.snapshot();
    expect(state.recentResponseHistory).toHaveLength(16);
    expect(state.recentResponseHistory[0]).toBe('response 4');
    expect(state.usedVariantIndices.k).toHaveLength(16);
  });

  it('snapshots a deep copy and resets', () => {
    const controller = new VariantController();
    controller.chooseVariant(options, 'k');
    const state = controller.snapshot();
    state.usedVariantIndices.k?.push(99);

    expect(controller.snapshot().usedVariantIndices.k).toEqual([0]);

    controller.reset();
    expect(controller.snapshot()).toEqual({ usedVariantIndices: {}, recentResponseHistory: [], recentFamilyHistory: [] });
  });
});
