/**
 * Reporter identity and registry type definitions
 */

/**
 * Checksummed 20-byte address of a reporting node
 */
export type ReporterId = string;

export enum ReporterStatus {
  Active = "active",
  Suspended = "suspended",
  Slashed = "slashed",
}

/**
 * One published round a reporter took part in, kept in its sliding outlier window
 */
export interface ParticipationEntry {
  feedKey: string;
  round: number;
  outlier: boolean;
}

export interface Reporter {
  id: ReporterId;
  stake: number;
  reputation: number;
  status: ReporterStatus;
  registeredAt: number;
  updatedAt: number;
  participation: ParticipationEntry[];
}

/**
 * Read-only view handed out to every component other than the registry itself
 */
export type ReporterView = Readonly<Omit<Reporter, "participation">> & {
  readonly participation: readonly Readonly<ParticipationEntry>[];
};

/**
 * Copy of the registry taken when a round opens. Stake checks and weights for that round use it.
 */
export type RegistrySnapshot = ReadonlyMap<ReporterId, ReporterView>;

export interface RegistryPolicy {
  minimumStake: number;
  initialReputation: number;
  minReputation: number;
  maxReputation: number;
  suspensionThreshold: number;
}

export interface SlashingPolicy {
  outlierPenalty: number;
  honestReward: number;
  windowRounds: number;
  repeatOffenseThreshold: number;
  slashFractionBps: number;
}
