import Database from 'better-sqlite3';
import { copyFileSync, existsSync, readdirSync, readFileSync, rmSync, statSync } from 'fs';
import { homedir, tmpdir } from 'os';
import { join } from 'path';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface CookieSource {
  /** `name=value; ...` for the domain and its subdomains, or an empty string. */
  cookieHeader(domain: string): string;
}

export class NoCookies implements CookieSource {
  cookieHeader(): string {
    return '';
  }
}

const log = logger.scope('cookies');

/** Picks the `Path=` of the section marked `Default=1` from a profiles.ini. */
export function defaultProfilePath(ini: string): string | null {
  let path: string | null = null;
  let isDefault = false;

  for (const raw of ini.split(/\r?\n/)) {
    const line = raw.trim();
    if (line.startsWith('[')) {
      if (isDefault && path) return path;
      path = null;
      isDefault = false;
    } else if (line.startsWith('Path=')) {
      path = line.slice('Path='.length);
    } else if (line === 'Default=1') {
      isDefault = true;
    }
  }

  return isDefault ? path : null;
}

export class FirefoxCookieSource implements CookieSource {
  private readonly firefoxDir: string;

  constructor(firefoxDir = join(homedir(), '.mozilla', 'firefox')) {
    this.firefoxDir = firefoxDir;
  }

  private findProfile(): string | null {
    if (!existsSync(this.firefoxDir)) return null;

    const iniPath = join(this.firefoxDir, 'profiles.ini');
    if (existsSync(iniPath)) {
      const path = defaultProfilePath(readFileSync(iniPath, 'utf-8'));
      if (path && existsSync(join(this.firefoxDir, path))) {
        return join(this.firefoxDir, path);
      }
    }

    // 没有默认配置时，取第一个带 cookies.sqlite 的目录
    for (const entry of readdirSync(this.firefoxDir)) {
      const dir = join(this.firefoxDir, entry);
      if (statSync(dir).isDirectory() && existsSync(join(dir, 'cookies.sqlite'))) {
        return dir;
      }
    }
    return null;
  }

  cookieHeader(domain: string): string {
    const profile = this.findProfile();
    const cookiesDb = profile ? join(profile, 'cookies.sqlite') : null;
    if (!cookiesDb || !existsSync(cookiesDb)) {
      log.debug('No Firefox cookies.sqlite found');
      return '';
    }

    // Firefox 运行时会锁库，先复制一份再读
    const tempDb = join(tmpdir(), `feedstash-cookies-${process.pid}.sqlite`);
    try {
      copyFileSync(cookiesDb, tempDb);
      const db = new Database(tempDb, { readonly: true, fileMustExist: true });
      try {
        const rows = db
          .prepare('SELECT name, value FROM moz_cookies WHERE host LIKE ? OR host LIKE ?')
          .all(`%${domain}`, domain) as { name: string; value: string }[];
        return rows.map(r => `${r.name}=${r.value}`).join('; ');
      } finally {
        db.close();
      }
    } catch (error) {
      log.debug(`Failed to read Firefox cookies: ${errorMessage(error)}`);
      return '';
    } finally {
      rmSync(tempDb, { force: true });
    }
  }
}

export function createCookieSource(kind: string | null): CookieSource {
  return kind === 'none' ? new NoCookies() : new FirefoxCookieSource();
}
