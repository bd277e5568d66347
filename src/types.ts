// --- Commit Types ---

export interface Commit {
  hash: string;
  date: string; // YYYY-MM-DD
  message: string;
  repo: string;
}

export type FileKind = 'source' | 'test' | 'config' | 'doc' | 'other';

export interface DiffStat {
  lines_added: number;
  lines_deleted: number;
  files_changed: number;
  source_lines_added: number;
  test_lines_added: number;
  config_lines_added: number;
  new_files_count: number;
}

// --- Score Types ---

export type CategoryScores = Record<string, number>;

/** Category name to classifier hit count (1-3). */
export type CategoryHits = Record<string, number>;

export interface Score {
  total: number;
  categories: CategoryScores;
}

export interface ScoreEntry extends Score {
  version: number;
}

export interface ScoredCommit extends Score {
  hash: string;
  date: string;
  repo: string;
}

export type ScoringMethod = 'pattern' | `classifier_${EnrichModel}`;

// --- Config Types ---

export interface DiffstatPolicy {
  largeSourceThreshold: number;
  mediumSourceThreshold: number;
  largeSourceBonus: number;
  mediumSourceBonus: number;
  majorNewFilesThreshold: number;
  minorNewFilesThreshold: number;
  majorNewFilesBonus: number;
  minorNewFilesBonus: number;
  configOnlyMultiplier: number;
  deletionHeavyThreshold: number;
  deletionHeavyMultiplier: number;
  multiplierFloor: number;
  multiplierCeiling: number;
  testLinesThreshold: number;
  testSafetyBonus: number;
}

export interface ScoringConfig extends DiffstatPolicy {
  /** Stamped on the score cache; bump it whenever weights or categories change. */
  cacheVersion: number;
}

export interface RubricCategoryConfig {
  weight: number;
  patterns: string[];
}

export interface RubricConfig {
  /** Replaces the built-in categories wholesale when present. */
  categories?: Record<string, RubricCategoryConfig>;
  highLevelCategories: string[];
  lowLevelCategories: string[];
}

export interface RepoScanConfig {
  scanDirs: string[];
  broadScan: {
    root: string | null;
    maxDepth: number;
  };
  skipPatterns: string[];
}

export const ENRICH_MODELS = {
  haiku: 'claude-haiku-4-5-20251001',
  sonnet: 'claude-sonnet-4-5-20250929',
} as const;

export type EnrichModel = keyof typeof ENRICH_MODELS;

export interface EnrichConfig {
  enabled: boolean;
  model: EnrichModel;
  batchSize: number;
  maxRetries: number;
  /** Per-request deadline for the classifier. */
  timeoutMs: number;
  apiUrl: string;
  apiKey?: string;
}

export interface SophisticationConfig {
  smoothingAlpha: number;
  ratioWeight: number;
}

export interface ClockConfig {
  inceptionDate: string; // YYYY-MM-DD
  repos: RepoScanConfig;
  scoring: ScoringConfig;
  rubric: RubricConfig;
  sophistication: SophisticationConfig;
  enrich: EnrichConfig;
}

export const DEFAULT_CONFIG: ClockConfig = {
  inceptionDate: '2025-06-30',
  repos: {
    scanDirs: [],
    broadScan: {
      root: null,
      maxDepth: 4,
    },
    skipPatterns: [
      '**/archive/**',
      '**/backup/**',
      '**/node_modules/**',
      '**/.Trash/**',
    ],
  },
  scoring: {
    cacheVersion: 3,
    largeSourceThreshold: 100,
    mediumSourceThreshold: 30,
    largeSourceBonus: 0.3,
    mediumSourceBonus: 0.15,
    majorNewFilesThreshold: 3,
    minorNewFilesThreshold: 1,
    majorNewFilesBonus: 0.2,
    minorNewFilesBonus: 0.1,
    configOnlyMultiplier: 0.8,
    deletionHeavyThreshold: 50,
    deletionHeavyMultiplier: 0.85,
    multiplierFloor: 0.4,
    multiplierCeiling: 2.0,
    testLinesThreshold: 10,
    testSafetyBonus: 2,
  },
  rubric: {
    highLevelCategories: ['agents', 'self_modify', 'meta', 'aql'],
    lowLevelCategories: ['foundation', 'elements', 'integration'],
  },
  sophistication: {
    smoothingAlpha: 0.3,
    ratioWeight: 0.6,
  },
  enrich: {
    enabled: false,
    model: 'haiku',
    batchSize: 50,
    maxRetries: 3,
    timeoutMs: 120_000,
    apiUrl: 'https://api.anthropic.com/v1/messages',
  },
};

// --- Aggregate Types ---

export interface MonthlyBucket {
  month: string; // YYYY-MM
  commits: number;
  capability: number;
  sophistication: number; // 0-1, smoothed
  cumulative_commits: number;
  cumulative_capability: number;
}

export interface WeeklyBucket {
  week: number;
  start: string; // YYYY-MM-DD
  commits: number;
  capability: number;
}

/** Month → category → rounded score. */
export type CategoryMonthly = Record<string, Record<string, number>>;

// --- Model Types ---

export interface CommitRateModel {
  L: number;
  r: number;
  t_mid: number;
  r_squared: number;
  zero_date: string | null;
  projection: Array<{ month: string; predicted_commits: number }>;
}

export interface CapabilityModel {
  L: number;
  r: number;
  t_mid: number;
  r_squared: number;
  pct_95_date: string;
  pct_99_date: string;
  pct_now: number;
  projection: Array<{ month: string; predicted_capability: number; pct_of_L: number }>;
}

export interface SophisticationModel {
  slope: number;
  intercept: number;
  r_squared: number;
  pct_100_date: string;
}

export interface FittedModels {
  commit_rate?: CommitRateModel;
  capability?: CapabilityModel;
  sophistication?: SophisticationModel;
  convergence_date?: string;
}

// --- History & Report Types ---

export interface CurrentState {
  total_commits: number;
  total_capability: number;
  pct_of_asymptote: number;
  latest_commit_date: string;
  current_sophistication: number;
  days_since_inception: number;
}

export interface HistoryEntry {
  scan_time: string; // ISO 8601
  convergence_date: string | null;
  component_dates: {
    commit_zero: string | null;
    capability_95: string | null;
    capability_99: string | null;
    sophistication_100: string | null;
  };
  days_until_convergence: number | null;
  total_commits: number;
  total_capability: number;
  pct_of_asymptote: number;
  capability_L: number | null;
  capability_r2: number | null;
  commit_rate_r2: number | null;
  scoring_method: ScoringMethod;
}

export interface ScoringSummary {
  method: ScoringMethod;
  enriched: number;
  fallback: number;
  cache_hits: number;
}

export interface ScanReport {
  generated: string;
  inception_date: string;
  repos_scanned: number;
  total_commits: number;
  monthly: MonthlyBucket[];
  monthly_baseline: MonthlyBucket[];
  weekly: WeeklyBucket[];
  models: FittedModels;
  current: CurrentState;
  category_monthly: CategoryMonthly;
  convergence_history: HistoryEntry[];
  scoring: ScoringSummary;
}
