import { readFile } from 'fs/promises';
import { join } from 'path';
import { BuildDescriptor } from '../runtime/container-runtime.port';

/** Static game server scaffold; resolves the same from src/ and dist/. */
export const SCAFFOLD_DIR = join(__dirname, '..', '..', '..', 'templates', 'game-server');

const SCAFFOLD_FILES = ['Dockerfile', 'package.json', 'server.js'] as const;

export const USER_MODULE_FILE = 'user_game.js';

/** Label every factory-built image and container carries. */
export const CREATED_BY_LABEL = { created_by: 'game-server-factory' } as const;

const DEFAULT_EXPORTS = `
module.exports = {
  initGame: typeof initGame === 'function' ? initGame : () => ({ clickCount: 0 }),
  handlePlayerAction:
    typeof handlePlayerAction === 'function'
      ? handlePlayerAction
      : (state, action) => {
          if (action === 'click') state.clickCount = (state.clickCount || 0) + 1;
          return state;
        },
};
`;

/**
 * Turns user game code into a loadable module.
 * Code that already assigns module.exports is returned unchanged; otherwise
 * initGame/handlePlayerAction declared at top level are exported, with defaults.
 */
export function wrap(userCode: string): string {
  if (/module\.exports\s*=/.test(userCode)) return userCode;
  return `${userCode.replace(/\s+$/, '')}\n${DEFAULT_EXPORTS}`;
}

export interface ScaffoldInput {
  serverId: string;
  name: string;
  userCode: string;
}

/** Build context for one game server: scaffold files plus the wrapped user module. */
export async function buildDescriptor(input: ScaffoldInput, scaffoldDir = SCAFFOLD_DIR): Promise<BuildDescriptor> {
  const files: Record<string, string> = {};
  for (const file of SCAFFOLD_FILES) {
    files[file] = await readFile(join(scaffoldDir, file), 'utf8');
  }
  files[USER_MODULE_FILE] = wrap(input.userCode);
  return {
    tag: input.serverId,
    files,
    labels: { ...CREATED_BY_LABEL, server_id: input.serverId, server_name: input.name },
  };
}
