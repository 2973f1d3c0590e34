// Resource types: kinds of component a bundle can hold
export const RESOURCE_TYPES = ['skill', 'command', 'agent', 'script', 'test'] as const;
export type ResourceType = (typeof RESOURCE_TYPES)[number];

// Plural group names used in catalog documents and directory conventions
export const RESOURCE_GROUPS = {
  skill: 'skills',
  command: 'commands',
  agent: 'agents',
  script: 'scripts',
  test: 'tests',
} as const satisfies Record<ResourceType, string>;

// Reference types: why one component points at another
export const REFERENCE_TYPES = ['script', 'skill', 'import', 'path', 'implements'] as const;
export type ReferenceType = (typeof REFERENCE_TYPES)[number];

export const RESOLUTION_STATUSES = ['resolved', 'unresolved', 'ambiguous', 'external'] as const;
export type ResolutionStatus = (typeof RESOLUTION_STATUSES)[number];

export const WARNING_KINDS = ['ParseWarning', 'IOError', 'DuplicateNotation'] as const;
export type WarningKind = (typeof WARNING_KINDS)[number];

export const OUTPUT_FORMATS = ['toon', 'json'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const DEFAULT_MAX_DEPTH = 10;

export const BUNDLE_LAYOUT = {
  MANIFEST: '.claude-plugin/plugin.json',
  SKILLS: 'skills',
  COMMANDS: 'commands',
  AGENTS: 'agents',
  SKILL_ENTRY: 'SKILL.md',
  SCRIPTS: 'scripts',
  SKILL_TESTS: 'tests',
} as const;

// Pseudo-bundle for the project-local component set
export const PROJECT_BUNDLE_NAME = 'project-skills';

export const DEFAULT_SCRIPT_EXTENSIONS = ['.py', '.sh', '.js', '.mjs', '.ts'] as const;

export const TEST_FILE_PATTERNS = [
  '**/test_*.py',
  '**/*_test.py',
  '**/conftest.py',
  '**/*.test.ts',
  '**/*.spec.ts',
  '**/*.test.js',
] as const;

export const IGNORE_DIRS = ['node_modules', '__pycache__', '.git', 'dist'] as const;

// A bundle directory named like a version belongs to its parent (installed cache layout)
export const VERSION_DIR_PATTERN = /^\d+\.\d+/;

export const CATALOG_DOCUMENT_VERSION = '1.0.0';
