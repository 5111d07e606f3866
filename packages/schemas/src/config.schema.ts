export const ClientConfigSchema = {
  type: "object",
  required: [
    "serverUrl", "username", "password", "gameId", "species", "background",
    "weapon", "narrateInterval", "actionTimeoutMs", "statusPath", "logLevel",
  ],
  properties: {
    serverUrl: { type: "string", pattern: "^wss?://" },
    username: { type: "string", minLength: 1, maxLength: 64 },
    password: { type: "string", minLength: 1 },
    gameId: { type: "string" },
    species: { type: "string", pattern: "^[a-zA-Z]$" },
    background: { type: "string", pattern: "^[a-zA-Z]$" },
    weapon: { type: "string", pattern: "^[a-zA-Z]?$" },
    narrateInterval: { type: "integer", minimum: 0, maximum: 1000 },
    actionTimeoutMs: { type: "integer", minimum: 100, maximum: 600000 },
    statusPath: { type: ["string", "null"] },
    logLevel: { type: "string", enum: ["debug", "info", "warn", "error"] },
  },
  additionalProperties: false,
} as const;

export const AutoPlayOptionsSchema = {
  type: "object",
  properties: {
    stopHpPercent: { type: "number" },
    maxActions: { type: "integer" },
    stopOnItems: { type: "boolean" },
    stopOnAltar: { type: "boolean" },
    autoDescend: { type: "boolean" },
    maxNonTrivialEnemies: { type: "integer" },
  },
  additionalProperties: false,
} as const;
