const SECRET_PATTERNS: RegExp[] = [
  /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g,
  /(--(?:access-token|password|token)[=\s]+)\S+/gi,
  /(QUALYS_ACCESS_TOKEN\s*=\s*)\S+/g,
  /(Bearer\s+)[A-Za-z0-9._~+/=-]{8,}/g,
  /eyJ[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}/g, // JWT
  /AccountKey=[A-Za-z0-9+/=]{20,}/g, // storage connection strings
  /((?:api_key|apikey|secret|token|password)\s*[:=]\s*)[A-Za-z0-9_\-]{16,}/gi
];

export function redactText(input: string): string {
  let out = input;
  for (const re of SECRET_PATTERNS) {
    out = out.replace(re, (match: string, prefix?: unknown) =>
      typeof prefix === "string" && match.startsWith(prefix) ? `${prefix}[REDACTED]` : "[REDACTED]"
    );
  }
  return out;
}
