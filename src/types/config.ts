/**
 * Settings and persisted configuration types.
 */

export interface Settings {
  muted: boolean;
  authToken: string;
  trayOnMinimize: boolean;
  pushEnabled: boolean;
  pushUserKey: string;
  pushAppToken: string;
  pushWhenMuted: boolean;
  pushIncludeMessage: boolean;
}

export interface Rule {
  name: string;
  senderId: string;
  soundPath: string;
  volume: number;
  pushSound: string;
}

/** Rule as supplied by a caller; missing fields take defaults. */
export interface RuleInput {
  name?: string;
  senderId: string;
  soundPath: string;
  volume?: number;
  pushSound?: string;
}

export interface AppState {
  settings: Settings;
  rules: Rule[];
}

/** Rule entry as written to config.json. */
export interface StoredRule {
  name: string;
  user_id: string;
  sound_path: string;
  volume: number;
  pushover_sound: string;
}

/** Shape of config.json (version 2). */
export interface StoredConfig {
  version: number;
  mute: boolean;
  token: string;
  tray_on_minimize: boolean;
  pushover_enabled: boolean;
  pushover_user_key: string;
  pushover_app_token: string;
  pushover_push_when_muted: boolean;
  pushover_include_message: boolean;
  rules: StoredRule[];
}
