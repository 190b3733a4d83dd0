import { defineKey } from './modules/keys';
import { type AnyLegacyMapping, mapLegacy } from './modules/migration';

/**
 * Application preference keys. Each name keeps its kind for good; add a new key
 * rather than changing the kind of an existing one.
 */
export const Keys = {
  // Appearance
  adaptiveColorEnabled: defineKey('adaptiveColorEnabled', 'bool'),
  glassEffect: defineKey('glassEffect', 'bool'),
  theme: defineKey('theme', 'string'),
  accentColor: defineKey('profile.accentColor', 'string'),

  // Input
  hapticEnabled: defineKey('hapticEnabled', 'bool'),
  gestureControlEnabled: defineKey('gestureControlEnabled', 'bool'),

  // Services
  relayBaseUrl: defineKey('relay.baseUrl', 'string'),
  relayDeviceToken: defineKey('relay.deviceToken', 'string'),
  relayApiKey: defineKey('relay.apiKey', 'string'),
  timeTrackingApiKey: defineKey('timeTracking.apiKey', 'string'),

  // Collections
  excludedApps: defineKey('excludedApps', 'stringList'),
  seenTipIds: defineKey('tips.seenIds', 'stringList'),
  hiddenMenuBarItems: defineKey('menuBar.hiddenItems', 'boolMap'),

  // Structured payloads, stored as encoded blobs
  vaultItems: defineKey('vault.items', 'blob'),
  notes: defineKey('notes.items', 'blob'),
  scriptHistory: defineKey('scripts.history', 'blob'),
  pinnedApps: defineKey('launcher.pinned', 'blob'),
  brainDumpItems: defineKey('brainDump.items', 'blob'),
  evolutionGenome: defineKey('evolution.genome', 'blob'),
} as const;

export const ALL_KEYS = Object.values(Keys);

/**
 * Fixed table of legacy preference names. Booleans always land in the new
 * store (legacy value or default); the others only when the legacy store
 * holds a value.
 */
export const LEGACY_TABLE: readonly AnyLegacyMapping[] = [
  mapLegacy('chameleonEnabled', Keys.adaptiveColorEnabled, true),
  mapLegacy('liquidGlass', Keys.glassEffect, false),
  mapLegacy('hapticEnabled', Keys.hapticEnabled, true),
  mapLegacy('gestureEyeEnabled', Keys.gestureControlEnabled, false),

  mapLegacy('excluded_apps', Keys.excludedApps),
  mapLegacy('TipEngine.seenTipIDs', Keys.seenTipIds),
  mapLegacy('menubar_redundancies', Keys.hiddenMenuBarItems),

  mapLegacy('notchTheme', Keys.theme),
  mapLegacy('notch.relay.base_url', Keys.relayBaseUrl),
  mapLegacy('notch.relay.device_token', Keys.relayDeviceToken),
  mapLegacy('notch.relay.api_key', Keys.relayApiKey),
  mapLegacy('notch.rescuetime.api_key', Keys.timeTrackingApiKey),
];
