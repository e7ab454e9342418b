import { homedir } from "node:os"
import { resolve } from "node:path"

import { config as loadDotEnv } from "dotenv"

loadDotEnv()

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/115.0.0.0 Safari/537.36"

const DATA_DIR = () => resolve(homedir(), ".profile-harvester")

export interface EnvConfig {
  dbPath: string
  masterDbPath: string
  userAgent: string
  chromiumPath: string | null
}

const nonEmpty = (value: string | undefined): string | null => {
  const trimmed = value?.trim()
  return trimmed ? trimmed : null
}

export const readEnvConfig = (env: NodeJS.ProcessEnv = process.env): EnvConfig => ({
  dbPath: nonEmpty(env.HARVEST_DB_PATH) ?? resolve(DATA_DIR(), "harvest.db"),
  masterDbPath: nonEmpty(env.HARVEST_MASTER_DB_PATH) ?? resolve(DATA_DIR(), "master.db"),
  userAgent: nonEmpty(env.HARVEST_USER_AGENT) ?? DEFAULT_USER_AGENT,
  chromiumPath: nonEmpty(env.HARVEST_CHROMIUM_PATH),
})
