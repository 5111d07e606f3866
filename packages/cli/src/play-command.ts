import type { AutoPlayOptions, AutoPlayReport, ClientConfig, PlayerState } from "@crawlbridge/schemas";
import { formatPlayerLine, formatReport } from "./report-formatter.js";

/** The part of GameClient the play command drives. */
export interface PlayHost {
  readonly player: Readonly<PlayerState>;
  readonly shutdownRequested: boolean;
  connect(url: string, username: string, password: string): Promise<string[]>;
  newAttempt(): string;
  startGame(species: string, background: string, weapon?: string, gameId?: string): Promise<string>;
  autoPlay(options: Partial<AutoPlayOptions>): Promise<AutoPlayReport>;
  narrate(thought: string): string;
  recordDeath(cause?: string): string;
  saveGame(): Promise<string>;
  disconnect(): Promise<void>;
}

export interface PlayCommandOptions {
  /** Auto-play runs to chain while each one stops for a routine reason. */
  rounds: number;
  /** Save instead of abandoning the character on the way out. */
  save: boolean;
  autoPlay: Partial<AutoPlayOptions>;
}

export interface PlayOutcome {
  reports: AutoPlayReport[];
  died: boolean;
}

const ROUTINE_STOPS = [/^picked up /, /^found an altar$/, /^level up: /, /^action limit reached /];

export function isRoutineStop(reason: string): boolean {
  return ROUTINE_STOPS.some((pattern) => pattern.test(reason));
}

/**
 * Connects, starts a character and chains auto-play runs, narrating the
 * outcome of each. The connection is always closed on the way out.
 */
export async function playSession(
  host: PlayHost,
  config: ClientConfig,
  options: PlayCommandOptions,
  print: (line: string) => void,
): Promise<PlayOutcome> {
  await host.connect(config.serverUrl, config.username, config.password);
  const reports: AutoPlayReport[] = [];
  try {
    print(host.newAttempt());
    await host.startGame(config.species, config.background, config.weapon, config.gameId);
    print(formatPlayerLine(host.player));

    for (let round = 1; round <= options.rounds; round++) {
      const report = await host.autoPlay(options.autoPlay);
      reports.push(report);
      print(formatReport(report));
      if (host.player.dead) {
        print(host.recordDeath());
        return { reports, died: true };
      }
      host.narrate(`Auto-play round ${round}: ${report.stopReason}`);
      if (host.shutdownRequested || !isRoutineStop(report.stopReason)) break;
    }

    print(formatPlayerLine(host.player));
    if (options.save) print(await host.saveGame());
    return { reports, died: false };
  } finally {
    await host.disconnect();
  }
}
