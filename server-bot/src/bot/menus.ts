import { InlineKeyboard } from "grammy";
import {
  LANGUAGES,
  SPEEDS,
  isLanguageKey,
  isSpeedKey,
  languageOf,
  speedOf,
  type LanguageKey,
  type SpeedKey,
  type VoicePrefs
} from "./voices.js";

export type MenuAction =
  | { type: "open"; menu: "lang" | "speed" | "dashboard" }
  | { type: "set_lang"; key: LanguageKey }
  | { type: "set_speed"; key: SpeedKey }
  | { type: "close" };

export const DASHBOARD_TEXT =
  "⚙️ <b>TTS Settings Dashboard</b>\n\nChoose an option to modify, or send me text to generate audio.";
export const LANGUAGE_MENU_TEXT = "🗣️ <b>Language Selection</b>\n\nChoose the language for the TTS voice:";
export const SPEED_MENU_TEXT = "⏱️ <b>Speed Selection</b>\n\nChoose the pace of speech:";
export const CLOSED_TEXT = "Settings closed. I'm ready for your text! ✍️";

/** Returns null for anything that is not a button this bot rendered. */
export function parseMenuAction(data: string): MenuAction | null {
  const [action, first, second, ...extra] = data.split(":");
  if (extra.length) return null;
  if (action === "open" && !second) {
    if (first === "lang" || first === "speed" || first === "dashboard") return { type: "open", menu: first };
    return null;
  }
  if (action === "set" && second !== undefined) {
    if (first === "lang" && isLanguageKey(second)) return { type: "set_lang", key: second };
    if (first === "speed" && isSpeedKey(second)) return { type: "set_speed", key: second };
    return null;
  }
  if (action === "close" && first === "settings" && !second) return { type: "close" };
  return null;
}

export function dashboardKeyboard(prefs: VoicePrefs): InlineKeyboard {
  const lang = languageOf(prefs);
  return new InlineKeyboard()
    .text(`🗣️ Language: ${lang.flag} ${lang.label}`, "open:lang")
    .row()
    .text(`⏱️ Speed: ${speedOf(prefs).label}`, "open:speed")
    .row()
    .text("↩️ Back to Chat", "close:settings");
}

export function openDashboardKeyboard(): InlineKeyboard {
  return new InlineKeyboard().text("⚙️ Open Settings Dashboard", "open:dashboard");
}

function gridKeyboard(buttons: Array<[label: string, data: string]>, perRow: number): InlineKeyboard {
  const keyboard = new InlineKeyboard();
  buttons.forEach(([label, data], idx) => {
    if (idx > 0 && idx % perRow === 0) keyboard.row();
    keyboard.text(label, data);
  });
  return keyboard.row().text("⬅️ Back to Dashboard", "open:dashboard");
}

export function languageKeyboard(prefs: VoicePrefs): InlineKeyboard {
  const buttons = Object.entries(LANGUAGES).map(([key, info]): [string, string] => {
    const label = `${info.flag} ${info.label}`;
    return [key === prefs.languageKey ? `✅ ${label}` : label, `set:lang:${key}`];
  });
  return gridKeyboard(buttons, 2);
}

export function speedKeyboard(prefs: VoicePrefs): InlineKeyboard {
  const buttons = Object.entries(SPEEDS).map(([key, info]): [string, string] => [
    key === prefs.speedKey ? `✅ ${info.label}` : info.label,
    `set:speed:${key}`
  ]);
  return gridKeyboard(buttons, 3);
}

export function welcomeText(prefs: VoicePrefs, maxTextChars: number): string {
  return [
    "👋 Welcome to the Multi-Language TTS Bot!",
    "",
    "I can convert any text you send me into a voice note.",
    "",
    "📝 <b>How to use me:</b>",
    `1. <b>Send a text message</b> (max ${maxTextChars} characters).`,
    "2. <b>Upload a <code>.txt</code> file</b> (even large ones are okay!).",
    "",
    "⚙️ <b>Configuration:</b>",
    "Use the <code>/settings</code> command to adjust the language and speech pace.",
    "",
    `🗣️ <b>Current Default Settings:</b> ${languageOf(prefs).label} at ${speedOf(prefs).label}.`
  ].join("\n");
}
