import { buildDescriptor, wrap } from '../../src/modules/factory/scaffold';
import { SIMPLE_GAME } from '../helpers';

describe('wrap', () => {
  it('returns code that already assigns module.exports unchanged', () => {
    const code = 'module.exports = { initGame: () => ({}) };';
    expect(wrap(code)).toBe(code);
  });

  it('appends default exports to bare game functions', () => {
    const wrapped = wrap('function initGame() { return {}; }\n\n');

    expect(wrapped.startsWith('function initGame() { return {}; }\n\nmodule.exports = {')).toBe(true);
    expect(wrapped).toContain("initGame: typeof initGame === 'function' ? initGame : () => ({ clickCount: 0 }),");
  });
});

describe('buildDescriptor', () => {
  it('bundles the scaffold with the wrapped user module', async () => {
    const descriptor = await buildDescriptor({ serverId: 'gs-demo-000000000001', name: 'Demo', userCode: SIMPLE_GAME });

    expect(descriptor.tag).toBe('gs-demo-000000000001');
    expect(Object.keys(descriptor.files).sort()).toEqual(['Dockerfile', 'package.json', 'server.js', 'user_game.js']);
    expect(descriptor.files['user_game.js']).toBe(wrap(SIMPLE_GAME));
    expect(descriptor.files['Dockerfile']).toContain('CMD ["node", "server.js"]');
    expect(descriptor.labels).toEqual({
      created_by: 'game-server-factory',
      server_id: 'gs-demo-000000000001',
      server_name: 'Demo',
    });
  });
});
