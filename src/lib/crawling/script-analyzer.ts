/**
 * Script Analyzer
 * Lexical scan of JavaScript source for function names and backend calls.
 * Nothing is executed or parsed; every match is reported independently.
 */

const IDENTIFIER = '[A-Za-z_$][\\w$]*';

const FUNCTION_PATTERNS: RegExp[] = [
  // function name(  /  async function name(  /  function* name(
  new RegExp(`\\bfunction\\s*\\*?\\s*(${IDENTIFIER})\\s*\\(`, 'g'),
  // name = function  /  obj.name = async function
  new RegExp(`(?<![\\w$])(${IDENTIFIER})\\s*=\\s*(?:async\\s+)?function\\b`, 'g'),
  // name = (a, b) =>  /  name = async x =>
  new RegExp(`(?<![\\w$])(${IDENTIFIER})\\s*=\\s*(?:async\\s+)?(?:\\([^()]*\\)|${IDENTIFIER})\\s*=>`, 'g'),
  // name: function
  new RegExp(`(?<![\\w$])(${IDENTIFIER})\\s*:\\s*(?:async\\s+)?function\\b`, 'g'),
];

const QUOTED = `['"\`]([^'"\`]+)['"\`]`;

const REFERENCE_PATTERNS: RegExp[] = [
  new RegExp(`\\bfetch\\(\\s*${QUOTED}`, 'g'),
  new RegExp(`\\baxios(?:\\.(?:get|post|put|patch|delete|head|request))?\\(\\s*${QUOTED}`, 'g'),
  new RegExp(`\\$\\.(?:ajax|get|post|getJSON|getScript)\\(\\s*${QUOTED}`, 'g'),
  // xhr.open('GET', '/path')
  new RegExp(`\\.open\\(\\s*['"\`][A-Za-z]+['"\`]\\s*,\\s*${QUOTED}`, 'g'),
  new RegExp(`\\burl\\s*:\\s*${QUOTED}`, 'g'),
  new RegExp(`\\bendpoint\\s*:\\s*${QUOTED}`, 'g'),
];

const RESERVED_WORDS = new Set([
  'function', 'return', 'if', 'else', 'for', 'while', 'do', 'switch', 'case', 'default',
  'new', 'typeof', 'instanceof', 'void', 'delete', 'in', 'of', 'this', 'var', 'let', 'const',
  'async', 'await', 'yield', 'class', 'extends', 'super', 'true', 'false', 'null', 'undefined',
]);

/**
 * Function names declared or bound in `source`, in order of first appearance
 */
export function extractFunctionNames(source: string): string[] {
  const names = collectMatches(source, FUNCTION_PATTERNS);
  return names.filter((name) => !RESERVED_WORDS.has(name));
}

/**
 * URLs passed to fetch/axios/jQuery/XMLHttpRequest calls, unresolved
 */
export function extractScriptReferences(source: string): string[] {
  return collectMatches(source, REFERENCE_PATTERNS).filter(
    (ref) => !ref.includes('${') && !ref.startsWith('#') && !ref.toLowerCase().startsWith('javascript:')
  );
}

function collectMatches(source: string, patterns: RegExp[]): string[] {
  const matches: { value: string; index: number }[] = [];

  for (const pattern of patterns) {
    for (const match of source.matchAll(pattern)) {
      const value = match[1]?.trim();
      if (value) {
        matches.push({ value, index: match.index ?? 0 });
      }
    }
  }

  matches.sort((a, b) => a.index - b.index);
  return Array.from(new Set(matches.map((entry) => entry.value)));
}
