/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { createChildLogger } from '../logger.js'
import type { ServerCapabilities } from '../types.js'
import type {
  ApplicationConfiguration,
  DatabaseConnectionConfig,
  QueryHandlingConfig
} from './schema-definitions.js'
import { ConfigurationAssembler } from './configuration-assembler.js'

export class ApplicationConfigurationManager {
  private static instance: ApplicationConfigurationManager | null = null
  private loadedConfiguration: ApplicationConfiguration | null = null

  private constructor() {}

  static getInstance(): ApplicationConfigurationManager {
    ApplicationConfigurationManager.instance ??= new ApplicationConfigurationManager()
    return ApplicationConfigurationManager.instance
  }

  private ensureConfigurationLoaded(): ApplicationConfiguration {
    if (!this.loadedConfiguration) {
      const logger = createChildLogger('config-manager')
      logger.debug('Loading configuration from environment and defaults')
      this.loadedConfiguration = ConfigurationAssembler.assembleFromEnvironment()
      logger.info({
        serverName: this.loadedConfiguration.name,
        version: this.loadedConfiguration.version,
        database: this.loadedConfiguration.database.database,
        host: this.loadedConfiguration.database.host,
        logLevel: this.loadedConfiguration.logging.level
      }, 'Configuration loaded successfully')
    }
    return this.loadedConfiguration
  }

  getServerIdentity(): Readonly<{ name: string; version: string }> {
    const config = this.ensureConfigurationLoaded()
    return {
      name: config.name,
      version: config.version
    }
  }

  getServerCapabilities(): ServerCapabilities {
    const config = this.ensureConfigurationLoaded()
    return {
      tools: { ...config.capabilities.tools },
      prompts: { ...config.capabilities.prompts }
    }
  }

  getDatabaseConnectionConfig(): Readonly<DatabaseConnectionConfig> {
    const config = this.ensureConfigurationLoaded()
    return { ...config.database }
  }

  getQueryHandlingConfig(): Readonly<QueryHandlingConfig> {
    const config = this.ensureConfigurationLoaded()
    return { ...config.query }
  }

  resetConfigurationForTesting(): void {
    this.loadedConfiguration = null
  }
}
