/**
 * Current package version, reported by the CLI and the MCP server.
 */
export const RULEWEAVER_VERSION = {
  major: 0,
  minor: 1,
  patch: 0,
  string: '0.1.0',
} as const;
