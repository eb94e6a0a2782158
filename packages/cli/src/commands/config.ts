import { Command } from 'commander';
import type { ConfigFlags } from '../utils/options.js';
import { addConfigOptions, loadConfig } from '../utils/options.js';

export const configCommand = addConfigOptions(
  new Command('config').description('Print the resolved configuration as JSON'),
).action((flags: ConfigFlags) => {
  const config = loadConfig(flags);
  if (!config) return;
  console.log(JSON.stringify(config, null, 2));
});
