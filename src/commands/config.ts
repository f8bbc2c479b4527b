import { Command } from 'commander';
import chalk from 'chalk';
import { deleteConfig, envKeyFor, getAllConfig, getConfig, isConfigKey, setConfig } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { CONFIG_KEYS, SECRET_KEYS, type ConfigKey } from '../models/config.js';
import { printJson, reportError, type JsonOption } from './shared.js';

function requireKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    throw new Error(`Unknown configuration key "${key}". Known keys: ${Object.values(CONFIG_KEYS).join(', ')}`);
  }
  return key;
}

export function maskValue(key: string, value: string): string {
  if (!SECRET_KEYS.some(secret => secret === key)) {
    return value;
  }
  return value.length > 8 ? `${value.slice(0, 4)}...` : '****';
}

export function createConfigCommand(): Command {
  const config = new Command('config').description('Manage configuration');

  config
    .command('set')
    .description('Set a configuration value')
    .argument('<key>', 'Configuration key')
    .argument('<value>', 'Configuration value')
    .option('--json', 'Output as JSON')
    .action((key: string, value: string, options: JsonOption) => {
      try {
        const configKey = requireKey(key);
        setConfig(configKey, value);

        if (options.json) {
          printJson({ success: true, key });
        } else {
          logger.success(`Configuration set: ${key} = ${maskValue(key, value)}`);
          const envKey = envKeyFor(configKey);
          if (envKey && process.env[envKey]) {
            logger.warn(`${envKey} is set in the environment and takes precedence`);
          }
        }
      } catch (error) {
        reportError(error, options);
      }
    });

  config
    .command('get')
    .description('Get a configuration value (environment, then stored value, then default)')
    .argument('<key>', 'Configuration key')
    .option('--json', 'Output as JSON')
    .action((key: string, options: JsonOption) => {
      try {
        const value = getConfig(requireKey(key));

        if (options.json) {
          printJson({ key, value });
        } else if (value !== null) {
          console.log(`${key} = ${value}`);
        } else {
          logger.warn(`Configuration not set: ${key}`);
        }
      } catch (error) {
        reportError(error, options);
      }
    });

  config
    .command('delete')
    .description('Delete a stored configuration value')
    .argument('<key>', 'Configuration key')
    .option('--json', 'Output as JSON')
    .action((key: string, options: JsonOption) => {
      try {
        const success = deleteConfig(requireKey(key));

        if (options.json) {
          printJson({ success });
        } else if (success) {
          logger.success(`Configuration deleted: ${key}`);
        } else {
          logger.warn(`Configuration not found: ${key}`);
        }
      } catch (error) {
        reportError(error, options);
      }
    });

  config
    .command('list')
    .description('List stored configuration values')
    .option('--json', 'Output as JSON')
    .action((options: JsonOption) => {
      const configs = getAllConfig().map(cfg => ({ key: cfg.key, value: maskValue(cfg.key, cfg.value) }));

      if (options.json) {
        printJson(configs);
        return;
      }

      if (configs.length === 0) {
        logger.info('No configurations found');
        console.log();
        console.log(chalk.dim('Available configuration keys:'));
        for (const key of Object.values(CONFIG_KEYS)) {
          const envKey = envKeyFor(key);
          console.log(chalk.dim(`  ${key}${envKey ? ` (env: ${envKey})` : ''}`));
        }
        return;
      }

      console.log();
      console.log(chalk.bold('Configurations:'));
      console.log();
      for (const cfg of configs) {
        console.log(`  ${chalk.cyan(cfg.key)} = ${cfg.value}`);
      }
      console.log();
    });

  return config;
}
