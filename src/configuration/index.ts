/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

export {
  ApplicationConfigurationSchema,
  DatabaseConnectionSchema,
  QueryHandlingSchema,
  type ApplicationConfiguration,
  type DatabaseConnectionConfig,
  type QueryHandlingConfig,
  type ObservabilityConfiguration
} from './schema-definitions.js'
export { EnvironmentConfigurationSource } from './environment-source.js'
export { ConfigurationAssembler } from './configuration-assembler.js'
export { ApplicationConfigurationManager } from './configuration-manager.js'
