/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { createChildLogger } from '../logger.js'
import { ConfigError, ErrorCode } from '../errors.js'
import { ApplicationConfigurationSchema, type ApplicationConfiguration } from './schema-definitions.js'
import { EnvironmentConfigurationSource } from './environment-source.js'

export class ConfigurationAssembler {
  private static get logger() {
    return createChildLogger('config-assembler')
  }

  static assembleFromEnvironment(): ApplicationConfiguration {
    this.logger.debug('Starting configuration assembly from environment sources')

    const rawConfigurationData = {
      ...EnvironmentConfigurationSource.extractServerIdentity(),
      capabilities: EnvironmentConfigurationSource.extractServerCapabilities(),
      database: EnvironmentConfigurationSource.extractDatabaseConnection(),
      query: EnvironmentConfigurationSource.extractQueryHandling(),
      logging: EnvironmentConfigurationSource.extractObservabilitySettings()
    }

    this.logger.debug({
      hasServerName: !!rawConfigurationData.name,
      hasDatabaseName: !!rawConfigurationData.database.database,
      host: rawConfigurationData.database.host,
      logLevel: rawConfigurationData.logging.level
    }, 'Raw configuration data extracted from environment')

    return this.validateAndTransform(rawConfigurationData)
  }

  private static validateAndTransform(rawData: unknown): ApplicationConfiguration {
    const validation = ApplicationConfigurationSchema.safeParse(rawData)
    if (validation.success) {
      this.logger.debug('Configuration validation and transformation successful')
      return validation.data
    }

    // Report the first failure; the rest are listed in details
    const [validationFailure, ...remaining] = validation.error.errors
    const fieldPath = validationFailure ? validationFailure.path.join('.') : ''
    const validationMessage = validationFailure ? validationFailure.message : 'Invalid configuration'

    this.logger.error({
      field: fieldPath,
      validationError: validationMessage,
      errorCode: validationFailure?.code,
      additionalFailures: remaining.length
    }, 'Configuration validation failed')

    throw new ConfigError(
      `Configuration validation failed: ${fieldPath}: ${validationMessage}`,
      ErrorCode.INVALID_CONFIG,
      {
        field: fieldPath,
        validationError: validationMessage,
        code: validationFailure?.code,
        path: validationFailure?.path,
        otherFields: remaining.map(issue => issue.path.join('.'))
      }
    )
  }
}
