/**
 * @fileoverview pagecite configuration
 */

export {
  DEFAULT_CONFIG_FILE,
  DEFAULT_SETTINGS,
  SettingsSchema,
  loadSettings,
  parseSettings,
  type LoadSettingsOptions,
  type Settings,
} from './settings.js';
