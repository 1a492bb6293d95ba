import { pino } from "pino";

export type Logger = {
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
};

export function createLogger(level: string): Logger {
  return pino({ name: "depot-planner", level });
}
