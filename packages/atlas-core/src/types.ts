import type {
  ResourceType,
  ReferenceType,
  ResolutionStatus,
  WarningKind,
} from './constants.js';

// ─── Components ──────────────────────────────────────────────────────────────

export interface ComponentId {
  bundle: string;
  type: ResourceType;
  name: string;
  skill?: string; // owning skill, scripts only
}

export interface Component extends ComponentId {
  notation: string;
  /** Absolute path of the component's entry file */
  path: string;
  /** Absolute path of everything the component owns: the skill directory, or the file itself */
  root: string;
  description?: string;
  /** Preloaded text; when absent the text is read from `path` on demand */
  content?: string;
}

export interface BundleInfo {
  name: string;
  /** Absolute base path */
  path: string;
  scope: 'primary' | 'secondary';
}

// ─── Scan results ────────────────────────────────────────────────────────────

export interface ScanWarning {
  kind: WarningKind;
  path: string;
  message: string;
}

export interface ContentFilterStats {
  inputCount: number;
  matchedCount: number;
  excludedCount: number;
}

export interface CatalogStatistics {
  totalBundles: number;
  total: number;
  byType: Record<ResourceType, number>;
  warningCount: number;
}

// ─── References ──────────────────────────────────────────────────────────────

export interface Provenance {
  line?: number;
  section?: string;
}

export interface Reference {
  source: string;
  type: ReferenceType;
  /** The text as written in the source */
  mention: string;
  status: ResolutionStatus;
  /** Component notation when the mention resolved to a catalog entry */
  target?: string;
  /** Absolute file path for path-like mentions */
  file?: string;
  /** Competing notations when a bare name matched more than one component */
  candidates?: string[];
  provenance: Provenance;
}
