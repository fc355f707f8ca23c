const KEY_ALIASES = new Map<string, string>([
  ["ctrl", "Control"],
  ["control", "Control"],
  ["cmd", "Meta"],
  ["command", "Meta"],
  ["win", "Meta"],
  ["meta", "Meta"],
  ["super", "Meta"],
  ["alt", "Alt"],
  ["option", "Alt"],
  ["shift", "Shift"],
  ["enter", "Enter"],
  ["return", "Enter"],
  ["esc", "Escape"],
  ["escape", "Escape"],
  ["tab", "Tab"],
  ["space", " "],
  ["backspace", "Backspace"],
  ["delete", "Delete"],
  ["del", "Delete"],
  ["insert", "Insert"],
  ["home", "Home"],
  ["end", "End"],
  ["pageup", "PageUp"],
  ["page_up", "PageUp"],
  ["pagedown", "PageDown"],
  ["page_down", "PageDown"],
  ["up", "ArrowUp"],
  ["down", "ArrowDown"],
  ["left", "ArrowLeft"],
  ["right", "ArrowRight"],
  ["arrowup", "ArrowUp"],
  ["arrowdown", "ArrowDown"],
  ["arrowleft", "ArrowLeft"],
  ["arrowright", "ArrowRight"],
  ["capslock", "CapsLock"]
]);

/** Maps loose key names ("ctrl", "esc", "f5") to keyboard key names. */
export function normalizeKey(key: string): string {
  const trimmed = key.trim();
  const lower = trimmed.toLowerCase();
  const alias = KEY_ALIASES.get(lower);
  if (alias !== undefined) {
    return alias;
  }
  if (/^f([1-9]|1[0-2])$/.test(lower)) {
    return lower.toUpperCase();
  }
  return trimmed;
}

/**
 * "ctrl+a" -> "Control+A". Single lower-case letters are upper-cased inside
 * chords so the modifier applies to the key, not the character.
 */
export function normalizeCombo(combo: string): string {
  const parts = combo
    .split("+")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
  if (parts.length === 0) {
    return combo;
  }
  const chord = parts.length > 1;
  return parts
    .map((part) => {
      const key = normalizeKey(part);
      return chord && /^[a-z]$/.test(key) ? key.toUpperCase() : key;
    })
    .join("+");
}
