import path from 'path';
import fs from 'fs';
import os from 'os';

export const APP_NAME = 'TalkAlert';

/**
 * Project root directory: walks up from __dirname to find package.json.
 * Works from any depth in dist/ after TypeScript compilation.
 */
export const PROJECT_ROOT: string = (() => {
  let dir = __dirname;
  while (dir !== path.dirname(dir)) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
    dir = path.dirname(dir);
  }
  return process.cwd();
})();

/**
 * Directory holding config.json: %APPDATA%/TalkAlert on Windows,
 * ~/TalkAlert elsewhere, or TALKALERT_CONFIG_DIR when set.
 */
export function resolveConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  if (env.TALKALERT_CONFIG_DIR) return env.TALKALERT_CONFIG_DIR;
  return path.join(env.APPDATA || os.homedir(), APP_NAME);
}
