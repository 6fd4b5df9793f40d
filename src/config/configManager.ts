import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import YAML from 'yaml';
import { AppError } from '../utils/errors';
import { AppConfig, configSchema, defaultConfig, defaultConfigDir } from './types';

export const CONFIG_FILE_NAME = 'config.yaml';

const INVALID_PATH_MESSAGE = 'invalid config path: must be in home directory (~/.aws-ssm/) or /etc/aws-ssm/';

/**
 * Expand a leading `~` to the home directory.
 */
export function expandHome(p: string, home: string = os.homedir()): string {
    if (p === '~') return home;
    if (p.startsWith('~/')) return path.join(home, p.slice(2));
    return p;
}

function isWithin(parent: string, child: string): boolean {
    const rel = path.relative(parent, child);
    return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}

/**
 * Resolve a config path override; it must land under the home directory or /etc.
 */
export function validateConfigPath(configPath: string, home: string = os.homedir()): string {
    const resolved = path.resolve(expandHome(configPath, home));
    if (isWithin(path.resolve(home), resolved) || isWithin('/etc', resolved)) {
        return resolved;
    }
    throw new AppError('Validation', INVALID_PATH_MESSAGE);
}

/**
 * Handles the config directory and the YAML config file.
 */
export class ConfigManager {
    private configPath: string;

    /**
     * @param restrictPath - confine overrides to the home directory or /etc (the `security` gate)
     */
    constructor(configPath?: string, private readonly home: string = os.homedir(), restrictPath = true) {
        const override = configPath || process.env.AWS_CONFIG_PATH;
        if (!override) {
            this.configPath = path.join(defaultConfigDir(home), CONFIG_FILE_NAME);
        } else {
            this.configPath = restrictPath
                ? validateConfigPath(override, home)
                : path.resolve(expandHome(override, home));
        }
    }

    getConfigPath(): string {
        return this.configPath;
    }

    /**
     * Ensures the configuration directory exists.
     */
    private async ensureConfigDir(): Promise<void> {
        const dir = path.dirname(this.configPath);
        try {
            await fs.access(dir);
        } catch {
            await fs.mkdir(dir, { recursive: true, mode: 0o700 });
        }
    }

    /**
     * Loads the config; a missing file yields the defaults.
     */
    async load(): Promise<AppConfig> {
        let raw: string;
        try {
            raw = await fs.readFile(this.configPath, 'utf-8');
        } catch (err) {
            if (isErrnoException(err) && err.code === 'ENOENT') {
                return this.finalize(defaultConfig());
            }
            throw new AppError('Internal', `failed to read config file ${this.configPath}`, err);
        }
        return this.parse(raw);
    }

    /**
     * Parses YAML text against the config schema.
     */
    parse(raw: string): AppConfig {
        let document: unknown;
        try {
            document = YAML.parse(raw);
        } catch (err) {
            throw new AppError('Validation', `invalid YAML in ${this.configPath}`, err);
        }

        const result = configSchema.safeParse(document ?? {});
        if (!result.success) {
            const issue = result.error.issues[0];
            throw new AppError('Validation', `invalid config ${issue.path.join('.')}: ${issue.message}`, result.error);
        }
        return this.finalize(result.data);
    }

    private finalize(config: AppConfig): AppConfig {
        return {
            ...config,
            cache: { ...config.cache, cache_dir: expandHome(config.cache.cache_dir, this.home) }
        };
    }

    /**
     * Saves the config as YAML.
     */
    async save(config: AppConfig): Promise<void> {
        await this.ensureConfigDir();
        await fs.writeFile(this.configPath, YAML.stringify(config), { mode: 0o600 });
    }

    /**
     * Writes a default config file when none exists. Returns true when written.
     */
    async init(): Promise<boolean> {
        try {
            await fs.access(this.configPath);
            return false;
        } catch {
            await this.save(defaultConfig());
            return true;
        }
    }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
    return err instanceof Error && 'code' in err;
}
