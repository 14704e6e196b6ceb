const envInt = (key: string, fallback: number): number => {
  const val = process.env[key]
  if (!val) return fallback
  const parsed = parseInt(val, 10)
  return Number.isNaN(parsed) ? fallback : parsed
}

const envString = (key: string, fallback: string): string => {
  const val = process.env[key]?.trim()
  return val ? val : fallback
}

export interface Settings {
  port: number
  configFile: string
  jiraEndpoint: string
  jiraTokenFile: string
  privateKeyFile: string
  syncIntervalMs: number
}

/**
 * Process-level settings. Read once at startup, after dotenv has populated
 * `process.env`.
 */
export const loadSettings = (): Settings => ({
  port: envInt("PORT", 8080),
  configFile: envString("CONFIG_FILE", "./config.yaml"),
  jiraEndpoint: envString("JIRA_ENDPOINT", "https://issues.redhat.com"),
  jiraTokenFile: envString("JIRA_TOKEN_FILE", "./jira-token"),
  privateKeyFile: envString("GITHUB_PRIVATE_KEY_FILE", "./private-key.pem"),
  syncIntervalMs: envInt("SYNC_INTERVAL_MS", 5 * 60 * 1000),
})
