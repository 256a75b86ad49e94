export { SettingsHolder } from './holder.js';
export { defineSetting, type ReadOnlySettings, type SettingKey } from './types.js';
