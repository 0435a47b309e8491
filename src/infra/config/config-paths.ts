import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

function resolveHomeDir(): string {
  const homeFromEnv = process.env.HOME;
  if (typeof homeFromEnv === 'string' && homeFromEnv.trim()) {
    return homeFromEnv;
  }
  return os.homedir();
}

export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.HAVEN_CONFIG_DIR;
  if (typeof override === 'string' && override.trim()) {
    if (!fs.existsSync(override)) {
      fs.mkdirSync(override, { recursive: true, mode: 0o700 });
    }
    return override;
  }

  const xdgConfigHome = env.XDG_CONFIG_HOME;
  const baseDir =
    typeof xdgConfigHome === 'string' && xdgConfigHome.trim()
      ? xdgConfigHome
      : path.join(resolveHomeDir(), '.config');
  const configDir = path.join(baseDir, 'haven');

  if (!fs.existsSync(configDir)) {
    fs.mkdirSync(configDir, { recursive: true, mode: 0o700 });
  }
  return configDir;
}

export function getDataDir(): string {
  // src/infra/config and dist/infra/config both sit three levels below the package root
  return path.resolve(__dirname, '..', '..', '..', 'data');
}

export function getDefaultLexiconPath(): string {
  return path.join(getDataDir(), 'default-lexicon.json');
}

export function getUserLexiconPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getConfigDir(env), 'lexicon.json');
}
