export { getSettings, getSetting, getDefaultSettings, parseBoolean, parseNonNegativeInteger } from './SettingsService';
export type { ReqfileSettings, Environment, SettingsWarning } from './SettingsService';
