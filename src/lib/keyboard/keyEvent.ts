import { readFileSync } from "fs";
import type { PageDriver } from "../page/driver.js";
import { PageInputError } from "../page/errors.js";

export interface KeyCodeTable {
  metaShiftOn: number;
  keyCodes: Map<string, number>;
}

const KEYCODES_FILE = new URL("../../../data/android-keycodes.json", import.meta.url);

let cachedTable: KeyCodeTable | null = null;

export function parseKeyCodeTable(raw: unknown): KeyCodeTable {
  if (typeof raw !== "object" || raw === null) {
    throw new Error("Key code table must be an object");
  }
  const metaShiftOn: unknown = Reflect.get(raw, "metaShiftOn");
  const keyCodes: unknown = Reflect.get(raw, "keyCodes");
  if (typeof metaShiftOn !== "number" || typeof keyCodes !== "object" || keyCodes === null) {
    throw new Error("Key code table needs numeric metaShiftOn and a keyCodes object");
  }

  const table = new Map<string, number>();
  for (const [char, code] of Object.entries(keyCodes)) {
    if (typeof code !== "number") {
      throw new Error(`Key code for '${char}' is not a number`);
    }
    table.set(char, code);
  }
  return { metaShiftOn, keyCodes: table };
}

export function loadKeyCodeTable(): KeyCodeTable {
  if (!cachedTable) {
    const raw: unknown = JSON.parse(readFileSync(KEYCODES_FILE, "utf-8"));
    cachedTable = parseKeyCodeTable(raw);
  }
  return cachedTable;
}

/**
 * Types text on an Android device one key code at a time.
 * Only characters present in the key code table are supported (no CJK input).
 */
export class KeyEvent {
  constructor(
    private readonly driver: PageDriver,
    private readonly table: KeyCodeTable = loadKeyCodeTable()
  ) {}

  async input(text: string): Promise<void> {
    for (const code of this.resolve(text)) {
      await this.driver.pressKeyCode(code);
    }
  }

  async inputCapital(text: string): Promise<void> {
    const codes = this.resolve(text);
    const chars = Array.from(text);
    for (let i = 0; i < codes.length; i++) {
      if (/[a-z]/i.test(chars[i] ?? "")) {
        await this.driver.pressKeyCode(codes[i], this.table.metaShiftOn);
      } else {
        await this.driver.pressKeyCode(codes[i]);
      }
    }
  }

  // Resolves every character up front so nothing is typed when one is unsupported
  private resolve(text: string): number[] {
    return Array.from(text).map((char) => {
      const code = this.table.keyCodes.get(char.toLowerCase());
      if (code === undefined) {
        throw new PageInputError(`Unsupported character for key input: '${char}'`);
      }
      return code;
    });
  }
}
