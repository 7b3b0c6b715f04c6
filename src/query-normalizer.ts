/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

export type QueryNormalizer = (query: string) => string

/**
 * Remove every backslash from generated SQL.
 * Lossy: a legitimately escaped literal such as 'O\'Brien' loses its escape.
 */
export const stripBackslashes: QueryNormalizer = (query) => query.replace(/\\/g, '')

export const preserveQuery: QueryNormalizer = (query) => query

export function composeNormalizers(...steps: QueryNormalizer[]): QueryNormalizer {
  return (query) => steps.reduce((current, step) => step(current), query)
}

export function selectNormalizer(options: { stripBackslashes: boolean }): QueryNormalizer {
  return options.stripBackslashes ? stripBackslashes : preserveQuery
}
