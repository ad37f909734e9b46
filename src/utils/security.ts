/**
 * Security utilities for log output and generated database queries.
 */

// Patterns to detect sensitive data
const SENSITIVE_PATTERNS = {
  apiKey: /(api[_-]?key|apikey|access[_-]?token|secret[_-]?key)(\s*[:=]\s*['"]?)([a-zA-Z0-9_-]{20,})/gi,
  bearer: /(Bearer\s+)[A-Za-z0-9._~+/=-]{16,}/g,
  mongoCredentials: /(mongodb(?:\+srv)?:\/\/)([^:@/\s]+):([^@/\s]+)@/gi,
  jwt: /eyJ[A-Za-z0-9-_=]+\.eyJ[A-Za-z0-9-_=]+\.?[A-Za-z0-9-_.+/=]*/g,
};

// Operators that run server-side JavaScript or write data; generated queries must never carry them
const FORBIDDEN_OPERATORS = new Set(['$where', '$function', '$accumulator', '$out', '$merge']);

/**
 * Mask credentials in free text before it is logged.
 */
export function maskSensitiveData(text: string): string {
  if (!text) return text;

  return text
    .replace(SENSITIVE_PATTERNS.mongoCredentials, '$1$2:***@')
    .replace(SENSITIVE_PATTERNS.apiKey, '$1$2***')
    .replace(SENSITIVE_PATTERNS.bearer, '$1***')
    .replace(SENSITIVE_PATTERNS.jwt, 'JWT_***');
}

/**
 * Lists every forbidden operator key in a query filter, at any depth, as a
 * dotted path.
 */
export function findForbiddenOperators(filter: unknown, path: string = ''): string[] {
  if (Array.isArray(filter)) {
    return filter.flatMap((item, index) => findForbiddenOperators(item, `${path}[${index}]`));
  }
  if (filter === null || typeof filter !== 'object') return [];

  const found: string[] = [];
  for (const [key, value] of Object.entries(filter)) {
    const keyPath = path ? `${path}.${key}` : key;
    if (FORBIDDEN_OPERATORS.has(key)) found.push(keyPath);
    found.push(...findForbiddenOperators(value, keyPath));
  }
  return found;
}
