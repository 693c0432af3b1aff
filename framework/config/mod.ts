/**
 * Configuration
 *
 * Settings for the view layer and logging, merged from defaults,
 * a JSON file and the environment.
 */

export { Config, type ConfigOptions, loadConfig } from './config.ts';
