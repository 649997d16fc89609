import { OPENBOX_SESSION_BIN } from "@@/host/paths.js";
import { joinLines } from "./shell.js";

export interface XSessionEntryOptions {
  displayName: string;
  comment: string;
}

const DEFAULT_ENTRY: XSessionEntryOptions = {
  displayName: "Openbox (Dialtone)",
  comment: "Openbox Session for the Dialtone kiosk"
};

export function renderXSessionEntry(options: XSessionEntryOptions = DEFAULT_ENTRY): string {
  return joinLines([
    "[Desktop Entry]",
    `Name=${options.displayName}`,
    `Comment=${options.comment}`,
    `Exec=${OPENBOX_SESSION_BIN}`,
    `TryExec=${OPENBOX_SESSION_BIN}`,
    "Type=Application"
  ]);
}
