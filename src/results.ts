import { alternativeRecord } from './alternatives.js';
import type { Alternative, TrialRecord } from './types.js';

/** Per-alternative aggregate over the last trial of every replication. */
export interface AlternativeSummary {
  alternative: Alternative;
  /** Mean of the final posterior means */
  finalMean: number;
  /** Mean of the final posterior standard deviations */
  finalStdDev: number;
  /** Mean of the final observation counts */
  meanCount: number;
  /** Fraction of all trials in which the alternative was chosen */
  choiceShare: number;
}

export interface ResultsSummary {
  replications: number;
  trials: number;
  alternatives: AlternativeSummary[];
  /** Alternative with the highest average final posterior mean (ties: first listed) */
  leader: Alternative | null;
}

/**
 * Recompute "chosen this trial" from the counts alone: an alternative was chosen
 * when its `n` grew since the previous record of the same replication.
 */
export function deriveChosenFlags(records: TrialRecord[]): Array<Record<Alternative, boolean>> {
  const out: Array<Record<Alternative, boolean>> = [];
  let prev: TrialRecord | null = null;
  for (const rec of records) {
    const sameReplication = prev !== null && prev.replication === rec.replication;
    const flags = alternativeRecord<boolean>();
    for (const [alt, a] of Object.entries(rec.alternatives)) {
      const before = sameReplication && prev ? prev.alternatives[alt]?.n ?? 0 : 0;
      flags[alt] = a.n > before;
    }
    out.push(flags);
    prev = rec;
  }
  return out;
}

/** Last record of each replication, in replication order. */
export function finalRecords(records: TrialRecord[]): TrialRecord[] {
  const last = new Map<number, TrialRecord>();
  for (const rec of records) {
    const seen = last.get(rec.replication);
    if (!seen || rec.trial >= seen.trial) last.set(rec.replication, rec);
  }
  return [...last.keys()].sort((a, b) => a - b).flatMap(r => {
    const rec = last.get(r);
    return rec ? [rec] : [];
  });
}

const avg = (xs: number[]): number => (xs.length ? xs.reduce((a, b) => a + b, 0) / xs.length : 0);

/**
 * Aggregate a results sequence. Pass the model's `alternatives` as `order` to keep
 * rows and the leader tie-break in configured order; record keys are used otherwise.
 */
export function summarizeResults(records: TrialRecord[], order?: readonly Alternative[]): ResultsSummary {
  const finals = finalRecords(records);
  const alternatives = order ? [...order] : records.length ? Object.keys(records[0].alternatives) : [];
  const chosenCounts = new Map<Alternative, number>();
  for (const rec of records) chosenCounts.set(rec.chosen, (chosenCounts.get(rec.chosen) ?? 0) + 1);

  const rows: AlternativeSummary[] = alternatives.map(alt => ({
    alternative: alt,
    finalMean: avg(finals.map(f => f.alternatives[alt]?.mean ?? 0)),
    finalStdDev: avg(finals.map(f => f.alternatives[alt]?.stdDev ?? 0)),
    meanCount: avg(finals.map(f => f.alternatives[alt]?.n ?? 0)),
    choiceShare: records.length ? (chosenCounts.get(alt) ?? 0) / records.length : 0
  }));

  let leader: Alternative | null = null;
  let best = Number.NEGATIVE_INFINITY;
  for (const row of rows) if (row.finalMean > best) { best = row.finalMean; leader = row.alternative; }

  return { replications: finals.length, trials: records.length, alternatives: rows, leader };
}

export function formatSummary(summary: ResultsSummary): string {
  const lines: string[] = [];
  lines.push(`Replications: ${summary.replications}, trials recorded: ${summary.trials}`);
  lines.push(['alternative'.padEnd(14), 'mean'.padStart(9), 'std'.padStart(9), 'n'.padStart(8), 'share'.padStart(8)].join(' '));
  for (const row of summary.alternatives) {
    lines.push([
      row.alternative.padEnd(14),
      row.finalMean.toFixed(4).padStart(9),
      row.finalStdDev.toFixed(4).padStart(9),
      row.meanCount.toFixed(2).padStart(8),
      `${(row.choiceShare * 100).toFixed(1)}%`.padStart(8)
    ].join(' '));
  }
  if (summary.leader !== null) lines.push(`Leader: ${summary.leader}`);
  return lines.join('\n');
}

/** Mean over replications of the highest final posterior mean. */
export function finalBestMean(records: TrialRecord[]): number {
  return avg(finalRecords(records).map(rec =>
    Math.max(...Object.values(rec.alternatives).map(a => a.mean))
  ));
}
