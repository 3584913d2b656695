export enum Level {
  Low,
  High,
}

export type Order = "LT" | "EQ" | "GT";

export type Mode = boolean | "auto";

export interface Settings {
  order?: Order | undefined;
  tone?: "warm" | undefined;
  mode: Mode;
}

export type Light = { kind: "off" } | { kind: "on"; level: Level; dim?: boolean | undefined };
