import { describe, expect, it } from 'vitest';
import { ChainTranslator } from './translator';
import { StubTranslator } from '../testing/stubTranslator';

describe('ChainTranslator', () => {
  it('uses the first translator that succeeds', async () => {
    const first = new StubTranslator({ words: { haus: 'house' }, fail: ['baum'] });
    const second = new StubTranslator({ words: { baum: 'tree' } });
    const chain = new ChainTranslator([first, second]);
    expect(await chain.translateWord('Haus', 'de', 'en')).toBe('house');
    expect(await chain.translateWord('Baum', 'de', 'en')).toBe('tree');
    expect(second.calls.map(c => c.input)).toEqual(['Baum']);
    expect(chain.name).toBe('stub → stub');
  });

  it('rejects with the last error when all fail', async () => {
    const chain = new ChainTranslator([new StubTranslator({ fail: ['x'] }), new StubTranslator({ fail: ['x'] })]);
    await expect(chain.translateText('x', 'de', 'en')).rejects.toThrow('stub: text translation failed');
  });

  it('needs at least one translator', () => {
    expect(() => new ChainTranslator([])).toThrow();
  });
});
