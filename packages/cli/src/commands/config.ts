/**
 * switchboard config: Read and change <home>/config.json
 *
 *   switchboard config get [key]
 *   switchboard config set <key> <value>
 *   switchboard config home [dir]      print, or persist, the home directory
 */

import { Command } from 'commander';
import {
  loadRuntimeConfig,
  resolveSwitchboardHome,
  saveRuntimeConfig,
  updateRuntimeConfig,
  CONFIG_KEYS,
  type ConfigKey,
} from '@switchboard/runtime-host';
import { openStateIO, type GlobalOptions } from './runtime.js';

function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}

const getCommand = new Command('get')
  .description('Print the configuration, or one key')
  .argument('[key]', `One of: ${CONFIG_KEYS.join(', ')}`)
  .action((key: string | undefined, _options: unknown, command: Command) => {
    const { config, warnings } = loadRuntimeConfig(openStateIO(command.optsWithGlobals<GlobalOptions>()));
    for (const warning of warnings) {
      // eslint-disable-next-line no-console
      console.error(warning);
    }
    if (key === undefined) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(config, null, 2));
      return;
    }
    if (!isConfigKey(key)) {
      // eslint-disable-next-line no-console
      console.error(`switchboard config: unknown config key "${key}" (expected one of: ${CONFIG_KEYS.join(', ')})`);
      process.exitCode = 1;
      return;
    }
    const value = config[key];
    // eslint-disable-next-line no-console
    console.log(Array.isArray(value) ? value.join(',') : String(value));
  });

const setCommand = new Command('set')
  .description('Change one key and write config.json')
  .argument('<key>', `One of: ${CONFIG_KEYS.join(', ')}`)
  .argument('<value>', 'true/false/on/off, or a comma-separated list for autoload')
  .action((key: string, value: string, _options: unknown, command: Command) => {
    const stateIO = openStateIO(command.optsWithGlobals<GlobalOptions>());
    const { config } = loadRuntimeConfig(stateIO);
    const result = updateRuntimeConfig(config, key, value);
    if (!result.ok) {
      // eslint-disable-next-line no-console
      console.error(`switchboard config: ${result.reason}`);
      process.exitCode = 1;
      return;
    }
    saveRuntimeConfig(stateIO, result.config);
  });

const homeCommand = new Command('home')
  .description('Print the home directory, or persist a new one to the OS config file')
  .argument('[dir]', 'Directory to use from now on')
  .action((dir: string | undefined, _options: unknown, command: Command) => {
    const globals = command.optsWithGlobals<GlobalOptions>();
    const home = resolveSwitchboardHome({ home: dir ?? globals.home, persist: dir !== undefined });
    // eslint-disable-next-line no-console
    console.log(home);
  });

export const configCommand = new Command('config')
  .description('Read and change the runtime configuration')
  .addCommand(getCommand)
  .addCommand(setCommand)
  .addCommand(homeCommand);
