export type IssueSeverity = 'high' | 'medium' | 'low';

export interface SecurityIssue {
  severity: IssueSeverity;
  message: string;
  /** 1-based. */
  line: number;
  snippet: string;
}

export interface CodeAnalysis {
  /** False iff at least one high-severity issue was found. */
  valid: boolean;
  issues: SecurityIssue[];
  warnings: string[];
}

interface DangerousPattern {
  pattern: RegExp;
  severity: IssueSeverity;
  message: string;
}

const MAX_LINES = 1000;
const SNIPPET_LENGTH = 120;

const DANGEROUS_PATTERNS: readonly DangerousPattern[] = [
  { pattern: /require\s*\(\s*['"](node:)?fs['"]/, severity: 'high', message: 'File system access' },
  { pattern: /require\s*\(\s*['"](node:)?child_process['"]/, severity: 'high', message: 'Child process execution' },
  { pattern: /require\s*\(\s*['"](node:)?path['"]/, severity: 'medium', message: 'Path manipulation' },
  { pattern: /require\s*\(\s*['"](node:)?https?['"]/, severity: 'medium', message: 'HTTP module usage' },
  { pattern: /require\s*\(\s*['"](node:)?net['"]/, severity: 'medium', message: 'Raw network module usage' },
  { pattern: /\beval\s*\(/, severity: 'high', message: 'eval() call' },
  { pattern: /(?<!\w)Function\s*\(/, severity: 'high', message: 'Function constructor' },
  { pattern: /setTimeout\s*\(\s*['"`]/, severity: 'medium', message: 'setTimeout with a string body' },
  { pattern: /setInterval\s*\(\s*['"`]/, severity: 'medium', message: 'setInterval with a string body' },
  { pattern: /process\.exit/, severity: 'medium', message: 'Process exit' },
  { pattern: /process\.env/, severity: 'low', message: 'Environment variable access' },
  { pattern: /__dirname/, severity: 'low', message: 'Directory path access' },
  { pattern: /__filename/, severity: 'low', message: 'File path access' },
  { pattern: /\bglobal\s*\./, severity: 'medium', message: 'Global object mutation' },
  { pattern: /\bBuffer\s*\./, severity: 'medium', message: 'Buffer usage' },
];

const EXPORT_PATTERN = /module\.exports\s*=|\bexports\.\w+\s*=|^\s*export\s/m;

/**
 * Line-by-line scan of user game code for constructs the sandbox should not run.
 * Only high-severity findings make the code invalid.
 */
export function analyzeCode(code: string): CodeAnalysis {
  const issues: SecurityIssue[] = [];
  const lines = code.split('\n');

  lines.forEach((text, idx) => {
    for (const { pattern, severity, message } of DANGEROUS_PATTERNS) {
      if (pattern.test(text)) {
        issues.push({ severity, message, line: idx + 1, snippet: text.trim().slice(0, SNIPPET_LENGTH) });
      }
    }
  });

  const warnings: string[] = [];
  if (!EXPORT_PATTERN.test(code)) {
    warnings.push('No module export found; the game logic will be wrapped automatically');
  }
  if (lines.length > MAX_LINES) {
    warnings.push(`Code has ${lines.length} lines (more than ${MAX_LINES})`);
  }

  return {
    valid: !issues.some((i) => i.severity === 'high'),
    issues,
    warnings,
  };
}
