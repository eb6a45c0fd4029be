/**
 * Clients
 *
 * The companies visits are performed for.
 */

import type { LocalDateTime } from './time-date'
import type { Adapter, Client } from './adapter'
import { uuid, requireText } from './internal/helpers'

export type ClientInput = {
  name: string
  address?: string
}

export async function createClient(
  adapter: Adapter,
  input: ClientInput,
  createdAt: LocalDateTime,
): Promise<string> {
  const name = requireText(input.name, 'Client name')
  const address = input.address?.trim()

  const id = uuid()
  await adapter.createClient({
    id,
    name,
    ...(address ? { address } : {}),
    createdAt,
  })
  return id
}

export function getClient(adapter: Adapter, id: string): Promise<Client | null> {
  return adapter.getClient(id)
}

export function getAllClients(adapter: Adapter): Promise<Client[]> {
  return adapter.getAllClients()
}
