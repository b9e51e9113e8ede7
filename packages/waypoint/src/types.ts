/**
 * Core type definitions for Waypoint.
 * Shared domain types live here; graph-internal shapes stay in graph/.
 */

// =============================================================================
// Result Type
// =============================================================================

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

// =============================================================================
// Source Attribution
// =============================================================================

/** Where a scene, edge or navigation call was written. */
export interface CallSite {
  readonly file: string;
  readonly line: number;
}

// =============================================================================
// Failure Reporting
// =============================================================================

export type FailureCode =
  | 'UNKNOWN_DESTINATION'
  | 'NO_ROUTE'
  | 'UNKNOWN_SCENE'
  | 'NO_INITIAL_SCENE'
  | 'GUARD_TIMEOUT'
  | 'GUARD_FAILED'
  | 'ELEMENT_NOT_FOUND'
  | 'EDGE_BLOCKED'
  | 'ACTION_FAILED';

export interface NavigationFailure {
  readonly code: FailureCode;
  readonly message: string;
  readonly site: CallSite;
  readonly expected: false;
}

/**
 * Receives every failure the navigator runs into.
 * Recording must not halt execution; the navigator carries on after it.
 */
export interface FailureRecorder {
  record(failure: NavigationFailure): void;
}

// =============================================================================
// Configuration Types
// =============================================================================

export interface DeviceConfig {
  readonly viewport: {
    readonly width: number;
    readonly height: number;
  };
  readonly userAgent?: string;
  readonly deviceScaleFactor: number;
  readonly isMobile: boolean;
  readonly hasTouch: boolean;
}

export interface WaitOptions {
  /** Upper bound for a guard or element wait, in milliseconds. */
  readonly timeout: number;
  readonly pollInterval: number;
}

export interface WaypointConfig {
  readonly navigation: {
    readonly guardTimeout: number;
    readonly pollInterval: number;
  };
  readonly devices: Record<string, DeviceConfig>;
  readonly output: {
    readonly dir: string;
  };
  readonly graphs: {
    readonly dir: string;
    readonly pattern: string;
  };
}

// =============================================================================
// Walk Types
// =============================================================================

export interface WalkMeta {
  readonly name: string;
  readonly description: string;
  readonly capturedAt: string;
  readonly baseUrl: string;
  readonly device: DeviceConfig;
  readonly outputDir: string;
}

export interface SceneCapture {
  readonly scene: string;
  readonly path: string;
}

export interface WalkResult {
  readonly meta: WalkMeta;
  readonly captured: readonly SceneCapture[];
  readonly unreached: readonly string[];
  readonly failures: readonly NavigationFailure[];
}

// =============================================================================
// CLI Types
// =============================================================================

export type OutputFormat = 'json' | 'markdown';

export interface ValidateCommand {
  readonly command: 'validate';
  readonly graphFile: string;
}

export interface RouteCommand {
  readonly command: 'route';
  readonly graphFile: string;
  readonly from: string | null;
  readonly to: string;
}

export interface WalkCommand {
  readonly command: 'walk';
  readonly graphFile: string;
  readonly baseUrl: string;
  readonly device: string;
  readonly output: string | null;
  readonly format: OutputFormat;
}

export interface ListCommand {
  readonly command: 'list';
  readonly dir: string | null;
}

export interface HelpCommand {
  readonly command: 'help';
  readonly subcommand: string | null;
}

export interface VersionCommand {
  readonly command: 'version';
}

export type Command =
  | ValidateCommand
  | RouteCommand
  | WalkCommand
  | ListCommand
  | HelpCommand
  | VersionCommand;

// =============================================================================
// Error Types
// =============================================================================

export type ParseErrorCode =
  | 'UNKNOWN_COMMAND'
  | 'MISSING_REQUIRED_ARG'
  | 'INVALID_ARG_VALUE';

export interface ParseError {
  readonly code: ParseErrorCode;
  readonly message: string;
  readonly arg?: string;
}

export type ConfigErrorCode =
  | 'CONFIG_INVALID'
  | 'CONFIG_LOAD_FAILED';

export interface ConfigError {
  readonly code: ConfigErrorCode;
  readonly message: string;
  readonly path?: string;
}

export type BrowserErrorCode =
  | 'LAUNCH_FAILED'
  | 'NAVIGATION_FAILED';

export interface BrowserError {
  readonly code: BrowserErrorCode;
  readonly message: string;
  readonly cause?: unknown;
}

export type ArtifactErrorCode =
  | 'NOT_FOUND'
  | 'IO_FAILED';

export interface ArtifactError {
  readonly code: ArtifactErrorCode;
  readonly message: string;
  readonly path: string;
}
