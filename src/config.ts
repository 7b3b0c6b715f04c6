/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

export type {
  ApplicationConfiguration as ServerConfig,
  DatabaseConnectionConfig as DatabaseConfig,
  QueryHandlingConfig as QueryConfig
} from './configuration/index.js'

import { ApplicationConfigurationManager, ConfigurationAssembler } from './configuration/index.js'

// Thin facade over the configuration manager used by servers and tests
export class ConfigManager {
  private static instance: ConfigManager | null = null
  private manager: ApplicationConfigurationManager

  private constructor() {
    this.manager = ApplicationConfigurationManager.getInstance()
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager()
    }
    return ConfigManager.instance
  }

  getServerInfo() {
    return this.manager.getServerIdentity()
  }

  getCapabilities() {
    return this.manager.getServerCapabilities()
  }

  getDatabaseConfig() {
    return this.manager.getDatabaseConnectionConfig()
  }

  getQueryConfig() {
    return this.manager.getQueryHandlingConfig()
  }

  reset() {
    this.manager.resetConfigurationForTesting()
  }
}

export function getConfig(): ConfigManager {
  return ConfigManager.getInstance()
}

export const loadConfiguration = () => {
  return ConfigurationAssembler.assembleFromEnvironment()
}
