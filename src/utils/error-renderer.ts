/**
 * Error renderer for CLI output: location, source snippet and suggestions
 * picked from the error message.
 */

import { SuiteLoadError } from '../runner/errors.ts';

export interface ErrorContext {
  message: string;
  /** Suite or config file the error belongs to */
  filePath?: string;
  /** File content, for a snippet around the line the message names */
  source?: string;
}

export interface FormattedError {
  summary: string;
  detail: string;
  suggestions: string[];
}

const ERROR_PATTERNS: Array<{
  pattern: RegExp;
  suggestions: (match: RegExpMatchArray) => string[];
}> = [
  {
    pattern: /Undefined template variable: ([\w.-]+)/i,
    suggestions: (match) => [
      `Add "${match[1]}" to the case's input map, or as a column in the cases file`,
      `Placeholders are written as {{${match[1]}}} and are case-sensitive`,
    ],
  },
  {
    pattern: /unknown assertion type "([^"]+)"(?: \(did you mean "([^"]+)"\?\))?/i,
    suggestions: (match) => {
      const hints = match[2] ? [`Replace "${match[1]}" with "${match[2]}"`] : [];
      hints.push(
        'Supported types: contains, not-contains, latency-max, min-length, max-length, regex, json-valid, snapshot'
      );
      return hints;
    },
  },
  {
    pattern: /missing API key: set (\w+)/i,
    suggestions: (match) => [
      `Export ${match[1]} in your shell, e.g. export ${match[1]}="..."`,
      'Or point api_key_env at another variable in .promptcheck/config.yaml',
    ],
  },
  {
    pattern: /webhook endpoint not configured/i,
    suggestions: () => ['Set providers.<name>.url in .promptcheck/config.yaml, or the variable named by url_env'],
  },
  {
    pattern: /unknown provider "([^"]+)"/i,
    suggestions: (match) => [
      `Declare "${match[1]}" under providers in .promptcheck/config.yaml`,
      'Built-in providers: openai, anthropic, webhook',
    ],
  },
  {
    pattern: /Cases file (\S+):/i,
    suggestions: (match) => [
      `Check that ${match[1]} exists and is readable`,
      'The first row must be a header; every row needs the same number of columns',
      'cases_file paths are relative to the suite file',
    ],
  },
  {
    pattern: /inline cases and cases_file cannot be combined/i,
    suggestions: () => ['Keep either the cases list or cases_file on this test, not both'],
  },
  {
    pattern: /invalid regex/i,
    suggestions: () => [
      'Regex values are JavaScript patterns without surrounding slashes',
      'Quote the value in YAML so backslashes are kept',
    ],
  },
  {
    pattern: /duplicate mapping key/i,
    suggestions: () => ['There are duplicate keys in your YAML file', 'Check for repeated test ids or input names'],
  },
  {
    pattern: /bad indentation/i,
    suggestions: () => [
      'Check YAML indentation - use consistent spaces (not tabs)',
      'Nested items should be indented 2 spaces from parent',
    ],
  },
  {
    pattern: /unexpected end of/i,
    suggestions: () => ['Check for unclosed quotes, brackets, or braces', 'Verify YAML structure is complete'],
  },
];

/**
 * js-yaml reports positions as "(line:column)"; other tools say "at line X, column Y".
 */
function extractYamlLocation(message: string): { line: number; column: number } | null {
  const yamlMark = message.match(/\((\d+):(\d+)\)/);
  if (yamlMark) {
    return { line: Number.parseInt(yamlMark[1], 10), column: Number.parseInt(yamlMark[2], 10) };
  }
  const match = message.match(/at line (\d+),?\s*column (\d+)/i);
  if (match) {
    return { line: Number.parseInt(match[1], 10), column: Number.parseInt(match[2], 10) };
  }
  return null;
}

function getSourceSnippet(source: string, line: number, column: number, contextLines = 2): string {
  const lines = source.split('\n');
  const startLine = Math.max(0, line - 1 - contextLines);
  const endLine = Math.min(lines.length, line + contextLines);
  const lineNumWidth = String(endLine).length;

  const snippetLines: string[] = [];
  for (let i = startLine; i < endLine; i++) {
    const lineNum = String(i + 1).padStart(lineNumWidth, ' ');
    const prefix = i === line - 1 ? '>' : ' ';
    snippetLines.push(`${prefix} ${lineNum} | ${lines[i]}`);

    if (i === line - 1 && column > 0) {
      snippetLines.push(`${' '.repeat(lineNumWidth + 4 + column - 1)}^`);
    }
  }

  return snippetLines.join('\n');
}

export function formatError(ctx: ErrorContext): FormattedError {
  const parts: string[] = [];
  const summary = ctx.message.split('\n')[0];
  const location = extractYamlLocation(ctx.message);

  if (ctx.filePath) {
    parts.push(`📍 Location: ${ctx.filePath}${location ? `:${location.line}:${location.column}` : ''}`);
  }

  parts.push('');
  parts.push(`❌ Error: ${ctx.message}`);

  if (ctx.source && location) {
    parts.push('');
    parts.push('📄 Source:');
    parts.push(getSourceSnippet(ctx.source, location.line, location.column || 1));
  }

  const suggestions: string[] = [];
  for (const { pattern, suggestions: getSuggestions } of ERROR_PATTERNS) {
    const match = ctx.message.match(pattern);
    if (match) {
      suggestions.push(...getSuggestions(match));
    }
  }

  if (suggestions.length > 0) {
    parts.push('');
    parts.push('💡 Suggestions:');
    for (const suggestion of suggestions) {
      parts.push(`   • ${suggestion}`);
    }
  }

  return { summary, detail: parts.join('\n'), suggestions };
}

/**
 * Render an error for the terminal, with ANSI colours when enabled.
 */
export function renderError(ctx: ErrorContext, useColor = true): string {
  const formatted = formatError(ctx);
  if (!useColor) {
    return formatted.detail;
  }

  const red = '\x1b[31m';
  const yellow = '\x1b[33m';
  const cyan = '\x1b[36m';
  const dim = '\x1b[2m';
  const reset = '\x1b[0m';
  const bold = '\x1b[1m';

  let output = formatted.detail;
  output = output.replace(/^📍.*$/m, (m) => `${cyan}${m}${reset}`);
  output = output.replace(/^❌.*$/m, (m) => `${red}${bold}${m}${reset}`);
  output = output.replace(/^💡.*$/m, (m) => `${yellow}${m}${reset}`);
  output = output.replace(/^>.*$/gm, (m) => `${red}${m}${reset}`);
  output = output.replace(/^\s+\^$/m, (m) => `${red}${m}${reset}`);
  output = output.replace(/^ {3}•.*$/gm, (m) => `${dim}${m}${reset}`);
  return output;
}

/**
 * Render anything the CLI catches, using the location an error carries.
 */
export function renderFailure(error: unknown, useColor = true): string {
  if (error instanceof SuiteLoadError) {
    // A YAML syntax error has one issue whose message carries the line and column
    const message = error.source ? (error.firstIssue ?? error.message) : error.message;
    return renderError({ message, filePath: error.filePath, source: error.source }, useColor);
  }
  return renderError({ message: error instanceof Error ? error.message : String(error) }, useColor);
}
