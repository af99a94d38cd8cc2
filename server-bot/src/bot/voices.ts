export type LanguageOption = {
  code: string;
  label: string;
  flag: string;
};

export type SpeedOption = {
  multiplier: number;
  label: string;
};

export const LANGUAGES = {
  en: { code: "en", label: "English", flag: "🇺🇸" },
  hi: { code: "hi", label: "Hindi", flag: "🇮🇳" },
  fr: { code: "fr", label: "French", flag: "🇫🇷" },
  es: { code: "es", label: "Spanish", flag: "🇪🇸" }
} as const satisfies Record<string, LanguageOption>;

export const SPEEDS = {
  "1.0": { multiplier: 1.0, label: "🚶 1x (Normal)" },
  "1.5": { multiplier: 1.5, label: "🏃 1.5x" },
  "2.0": { multiplier: 2.0, label: "💨 2x (Fast)" },
  "2.5": { multiplier: 2.5, label: "🚀 2.5x" },
  "3.0": { multiplier: 3.0, label: "⚡ 3x (Very Fast)" }
} as const satisfies Record<string, SpeedOption>;

export type LanguageKey = keyof typeof LANGUAGES;
export type SpeedKey = keyof typeof SPEEDS;

export type VoicePrefs = {
  languageKey: LanguageKey;
  speedKey: SpeedKey;
};

export const DEFAULT_VOICE_PREFS: VoicePrefs = { languageKey: "hi", speedKey: "1.0" };

export function isLanguageKey(value: string): value is LanguageKey {
  return Object.prototype.hasOwnProperty.call(LANGUAGES, value);
}

export function isSpeedKey(value: string): value is SpeedKey {
  return Object.prototype.hasOwnProperty.call(SPEEDS, value);
}

export function languageOf(prefs: VoicePrefs): LanguageOption {
  return LANGUAGES[prefs.languageKey];
}

export function speedOf(prefs: VoicePrefs): SpeedOption {
  return SPEEDS[prefs.speedKey];
}

export function describeVoice(prefs: VoicePrefs): string {
  return `${languageOf(prefs).label} at ${speedOf(prefs).label}`;
}
