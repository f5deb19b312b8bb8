import type { ExistingInstallation } from '@shared/contracts';

export const UNKNOWN_VERSION = 'Unknown';

type StringField =
  | 'siteName'
  | 'installPath'
  | 'databaseServer'
  | 'databaseName'
  | 'version'
  | 'packagePath'
  | 'targetVersion';
type CountField = 'productCount' | 'orderCount' | 'userCount';

type FieldSpec =
  | { kind: 'string'; field: StringField; flags: string[] }
  | { kind: 'count'; field: CountField; flags: string[] }
  | { kind: 'boolean'; field: 'isHealthy'; flags: string[] }
  | { kind: 'list'; field: 'issues'; flags: string[] };

const FIELD_SPECS: FieldSpec[] = [
  { kind: 'string', field: 'siteName', flags: ['--sitename', '-s'] },
  { kind: 'string', field: 'installPath', flags: ['--installpath', '-i'] },
  { kind: 'string', field: 'databaseServer', flags: ['--dbserver', '-ds'] },
  { kind: 'string', field: 'databaseName', flags: ['--dbname', '-dn'] },
  { kind: 'string', field: 'version', flags: ['--version', '-v'] },
  { kind: 'count', field: 'productCount', flags: ['--productcount'] },
  { kind: 'count', field: 'orderCount', flags: ['--ordercount'] },
  { kind: 'count', field: 'userCount', flags: ['--usercount'] },
  { kind: 'boolean', field: 'isHealthy', flags: ['--healthy'] },
  { kind: 'list', field: 'issues', flags: ['--issue'] },
  { kind: 'string', field: 'packagePath', flags: ['--package', '-p'] },
  { kind: 'string', field: 'targetVersion', flags: ['--targetversion', '-tv'] }
];

const REQUIRED_FIELDS: ReadonlyArray<StringField> = ['siteName', 'installPath', 'databaseServer', 'databaseName'];

const FLAG_LOOKUP = new Map<string, FieldSpec>(
  FIELD_SPECS.flatMap((spec) => spec.flags.map((flag): [string, FieldSpec] => [flag, spec]))
);

export interface HandoffPayload {
  installation: ExistingInstallation;
  /** Artifact the installer already downloaded, when it has one to pass on. */
  packagePath: string | null;
  /** Release the package belongs to; the upgrader resolves exactly this version. */
  targetVersion: string | null;
}

export interface HandoffExtras {
  packagePath?: string;
  targetVersion?: string;
}

export type HandoffDecodeResult =
  | { ok: true; payload: HandoffPayload }
  | { ok: false; missing: string[]; errorMessage: string };

export function encodeHandoff(installation: ExistingInstallation, extras: HandoffExtras = {}): string[] {
  const tokens = [
    '--sitename',
    quote(installation.siteName),
    '--installpath',
    quote(installation.installPath),
    '--dbserver',
    quote(installation.databaseServer),
    '--dbname',
    quote(installation.databaseName),
    '--version',
    quote(installation.version),
    '--productcount',
    String(Math.trunc(installation.productCount)),
    '--ordercount',
    String(Math.trunc(installation.orderCount)),
    '--usercount',
    String(Math.trunc(installation.userCount)),
    '--healthy',
    String(installation.isHealthy)
  ];

  for (const issue of installation.issues ?? []) {
    tokens.push('--issue', quote(issue));
  }
  if (extras.packagePath) {
    tokens.push('--package', quote(extras.packagePath));
  }
  if (extras.targetVersion) {
    tokens.push('--targetversion', quote(extras.targetVersion));
  }

  return tokens;
}

export function decodeHandoff(args: readonly string[]): HandoffDecodeResult {
  const strings: Partial<Record<StringField, string>> = {};
  const counts: Record<CountField, number> = { productCount: 0, orderCount: 0, userCount: 0 };
  let isHealthy = true;
  let issues: string[] | undefined;

  for (let i = 0; i < args.length; i += 1) {
    const token = args[i] ?? '';
    const { flag, inlineValue } = splitFlag(token);
    const spec = FLAG_LOOKUP.get(flag);
    if (!spec) {
      continue;
    }

    let value: string;
    if (inlineValue !== null) {
      value = inlineValue;
    } else {
      const next = args[i + 1];
      if (next === undefined || isKnownFlag(next)) {
        continue;
      }
      value = next;
      i += 1;
    }

    const unquoted = stripQuotes(value);
    switch (spec.kind) {
      case 'string':
        strings[spec.field] = unquoted;
        break;
      case 'count':
        counts[spec.field] = parseCount(unquoted);
        break;
      case 'boolean':
        isHealthy = parseBoolean(unquoted, isHealthy);
        break;
      case 'list':
        issues = [...(issues ?? []), unquoted];
        break;
    }
  }

  const missing = REQUIRED_FIELDS.filter((field) => !strings[field]);
  const siteName = strings.siteName;
  const installPath = strings.installPath;
  const databaseServer = strings.databaseServer;
  const databaseName = strings.databaseName;
  if (missing.length > 0 || !siteName || !installPath || !databaseServer || !databaseName) {
    const names = missing.map(describeField);
    return {
      ok: false,
      missing: names,
      errorMessage: `Argumentos obrigatorios ausentes: ${names.join(', ')}.`
    };
  }

  const installation: ExistingInstallation = {
    siteName,
    installPath,
    databaseServer,
    databaseName,
    version: strings.version || UNKNOWN_VERSION,
    isHealthy,
    productCount: counts.productCount,
    orderCount: counts.orderCount,
    userCount: counts.userCount
  };
  if (issues) {
    installation.issues = issues;
  }

  return {
    ok: true,
    payload: {
      installation,
      packagePath: strings.packagePath || null,
      targetVersion: strings.targetVersion || null
    }
  };
}

export function decodeInstallation(args: readonly string[]): ExistingInstallation | null {
  const decoded = decodeHandoff(args);
  return decoded.ok ? decoded.payload.installation : null;
}

/** Renders tokens as a single command line, for logs only. */
export function formatCommandLine(tokens: readonly string[]): string {
  return tokens.map((token) => (/\s/.test(token) && !isQuoted(token) ? `"${token}"` : token)).join(' ');
}

function splitFlag(token: string): { flag: string; inlineValue: string | null } {
  if (!token.startsWith('-')) {
    return { flag: '', inlineValue: null };
  }

  const eq = token.indexOf('=');
  if (eq > 0) {
    return { flag: token.slice(0, eq).toLowerCase(), inlineValue: token.slice(eq + 1) };
  }

  return { flag: token.toLowerCase(), inlineValue: null };
}

function isKnownFlag(token: string): boolean {
  return FLAG_LOOKUP.has(splitFlag(token).flag);
}

function quote(value: string): string {
  return `"${value}"`;
}

function isQuoted(value: string): boolean {
  return value.length >= 2 && ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")));
}

function stripQuotes(value: string): string {
  return isQuoted(value) ? value.slice(1, -1) : value;
}

function parseCount(value: string): number {
  const trimmed = value.trim();
  return /^-?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : 0;
}

function parseBoolean(value: string, fallback: boolean): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1' || normalized === 'yes') {
    return true;
  }
  if (normalized === 'false' || normalized === '0' || normalized === 'no') {
    return false;
  }
  return fallback;
}

function describeField(field: StringField): string {
  const spec = FIELD_SPECS.find((candidate) => candidate.field === field);
  return spec?.flags[0] ?? field;
}
