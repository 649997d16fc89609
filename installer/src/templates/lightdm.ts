import { GREETER_SESSION } from "@@/host/paths.js";
import { joinLines } from "./shell.js";

export interface AutologinOptions {
  user: string;
  sessionName: string;
  timeoutSeconds?: number;
}

export function renderLightdmConf({ user, sessionName, timeoutSeconds = 0 }: AutologinOptions): string {
  return joinLines([
    "[Seat:*]",
    `autologin-user=${user}`,
    `autologin-user-timeout=${timeoutSeconds}`,
    `user-session=${sessionName}`,
    `greeter-session=${GREETER_SESSION}`
  ]);
}
