import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type {
  CapabilityModel,
  CommitRateModel,
  FittedModels,
  MonthlyBucket,
  SophisticationModel,
} from '../types.js';
import { dayNumber, fromDayNumber, monthOf, periodDate } from './dates.js';
import { fitLogistic, intRange, linreg, logistic, logisticDeriv, round, rSquared } from './math.js';

// --- Search grids ---

const PROJECTION_PERIODS = 12;
/** Commit rate below which development counts as winding down. */
const ZERO_RATE_THRESHOLD = 10;
const ZERO_SCAN_LIMIT10 = 360;
/** Period offset used when a milestone is never reached. */
const FAR_FUTURE_PERIODS = 99;

const COMMIT_R10 = intRange(3, 30);
const CAPABILITY_R10 = intRange(3, 50);
const TMID10 = intRange(5, 50);

function asymptoteRange(total: number, upperFactor: number): number[] {
  return intRange(Math.trunc(total * 1.01), Math.trunc(total * upperFactor), Math.max(1, Math.trunc(total * 0.02)));
}

// --- Components ---

function fitCommitRate(t: number[], cumulative: number[], epoch: string, logger: Logger): CommitRateModel | undefined {
  const total = cumulative[cumulative.length - 1];
  const best = fitLogistic(t, cumulative, {
    L: asymptoteRange(total, 1.5),
    r10: COMMIT_R10,
    tMid10: TMID10,
  });
  if (!best) return undefined;
  const { L, r, tMid, rSquared: r2 } = best;

  let zeroT: number | null = null;
  for (let check = Math.trunc(tMid * 10); check < ZERO_SCAN_LIMIT10; check++) {
    const ct = check / 10;
    if (logisticDeriv(ct, L, r, tMid) < ZERO_RATE_THRESHOLD) {
      zeroT = ct;
      break;
    }
  }
  const zeroDate = zeroT === null ? null : periodDate(epoch, zeroT);

  const projection = intRange(t.length, t.length + PROJECTION_PERIODS).map(ft => ({
    month: monthOf(periodDate(epoch, ft)),
    predicted_commits: Math.round(logisticDeriv(ft, L, r, tMid)),
  }));

  logger.detail(`    L=${L}, r=${r.toFixed(1)}, t_mid=${tMid.toFixed(1)}, R2=${r2.toFixed(4)}, zero=${zeroDate ?? 'none'}`);

  return {
    L,
    r: round(r, 2),
    t_mid: round(tMid, 2),
    r_squared: round(r2, 4),
    zero_date: zeroDate,
    projection,
  };
}

function fitCapability(t: number[], cumulative: number[], epoch: string, logger: Logger): CapabilityModel | undefined {
  const total = cumulative[cumulative.length - 1];
  const best = fitLogistic(t, cumulative, {
    L: asymptoteRange(total, 2.0),
    r10: CAPABILITY_R10,
    tMid10: TMID10,
  });
  if (!best) return undefined;
  const { L, r, tMid, rSquared: r2 } = best;

  const t95 = r > 0 ? tMid + Math.log(19) / r : FAR_FUTURE_PERIODS;
  const t99 = r > 0 ? tMid + Math.log(99) / r : FAR_FUTURE_PERIODS;
  const pctNow = L > 0 ? (total / L) * 100 : 0;

  const projection = intRange(t.length, t.length + PROJECTION_PERIODS).map(ft => {
    const cap = logistic(ft, L, r, tMid);
    return {
      month: monthOf(periodDate(epoch, ft)),
      predicted_capability: Math.round(cap),
      pct_of_L: round((cap / L) * 100, 1),
    };
  });

  logger.detail(`    L=${L}, r=${r.toFixed(1)}, t_mid=${tMid.toFixed(1)}, R2=${r2.toFixed(4)}, now=${pctNow.toFixed(1)}%`);

  return {
    L: Math.round(L),
    r: round(r, 2),
    t_mid: round(tMid, 2),
    r_squared: round(r2, 4),
    pct_95_date: periodDate(epoch, t95),
    pct_99_date: periodDate(epoch, t99),
    pct_now: round(pctNow, 1),
    projection,
  };
}

function fitSophistication(t: number[], values: number[], epoch: string, logger: Logger): SophisticationModel | undefined {
  const xs: number[] = [];
  const ys: number[] = [];
  values.forEach((s, i) => {
    if (s > 0) {
      xs.push(t[i]);
      ys.push(s);
    }
  });
  if (xs.length < 2) return undefined;

  const { intercept, slope } = linreg(xs, ys);
  const r2 = rSquared(ys, xs.map(x => intercept + slope * x));
  const t100 = slope > 0 ? (1 - intercept) / slope : FAR_FUTURE_PERIODS;
  const date = periodDate(epoch, t100);

  logger.detail(`    slope=${slope.toFixed(4)}, intercept=${intercept.toFixed(4)}, 100%=${date}`);

  return {
    slope: round(slope, 4),
    intercept: round(intercept, 4),
    r_squared: round(r2, 4),
    pct_100_date: date,
  };
}

/** Floor of the mean day number of every milestone the models produced. */
export function convergenceDate(models: FittedModels): string | undefined {
  const dates: string[] = [];
  if (models.commit_rate?.zero_date) dates.push(models.commit_rate.zero_date);
  if (models.capability) dates.push(models.capability.pct_95_date, models.capability.pct_99_date);
  if (models.sophistication) dates.push(models.sophistication.pct_100_date);
  if (dates.length === 0) return undefined;

  const sum = dates.reduce((acc, d) => acc + dayNumber(d), 0);
  return fromDayNumber(Math.floor(sum / dates.length));
}

/**
 * Fits the commit-rate and capability logistics, the sophistication trend
 * and their combined convergence date. Components that cannot be fitted are
 * left out; an empty series yields `{}`.
 */
export function fitModels(monthly: MonthlyBucket[], epoch: string, logger: Logger = silentLogger): FittedModels {
  if (monthly.length === 0) return {};

  const t = monthly.map((_, i) => i);
  const models: FittedModels = {};

  logger.info('  Fitting commit rate model...');
  const commitRate = fitCommitRate(t, monthly.map(m => m.cumulative_commits), epoch, logger);
  if (commitRate) models.commit_rate = commitRate;

  logger.info('  Fitting capability model...');
  const capability = fitCapability(t, monthly.map(m => m.cumulative_capability), epoch, logger);
  if (capability) models.capability = capability;

  logger.info('  Fitting sophistication model...');
  const sophistication = fitSophistication(t, monthly.map(m => m.sophistication), epoch, logger);
  if (sophistication) models.sophistication = sophistication;

  const convergence = convergenceDate(models);
  if (convergence) {
    models.convergence_date = convergence;
    logger.info(`  Convergence date: ${convergence}`);
  }

  return models;
}
