import { readFileSync } from 'fs'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'
import { errorMessage, type DeviceDescriptor, type LogFn } from './types'

export const DEFAULT_PORT = 22
export const DEFAULT_TIMEOUT_SECONDS = 30

// Passwords may be written unquoted in YAML and come back as numbers
const secret = z.union([z.string(), z.number()]).transform(String)

// A key written with no value (`password:`) parses as null and counts as unset
const connectionFields = {
  username: z.string().min(1).nullish(),
  password: secret.nullish(),
  port: z.number().int().min(1).max(65535).nullish(),
  timeout: z.number().positive().nullish(),
}

const defaultsSchema = z.object({
  ...connectionFields,
  admin_user: z.string().min(1).nullish(),
  user_password: z.record(secret.nullish()).nullish(),
}).passthrough()

const hostEntrySchema = z.object({
  ...connectionFields,
  host: z.string().min(1),
  name: z.string().min(1).nullish(),
  tags: z.array(z.string()).nullish(),
}).passthrough()

export type InventoryDefaults = z.infer<typeof defaultsSchema>
export type HostEntry = z.infer<typeof hostEntrySchema>
type HostGroups = Record<string, unknown[] | null | undefined>

export const inventorySchema = z.object({
  defaults: defaultsSchema.nullish().transform((value): InventoryDefaults => value ?? {}),
  host_groups: z.record(z.array(z.unknown()).nullish()).nullish().transform((value): HostGroups => value ?? {}),
})

function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
}

/**
 * Merge defaults into one host entry (entry wins) and resolve its password.
 * Returns null, after a warning, when the host cannot be connected to.
 */
export function resolveHost(
  entry: HostEntry,
  defaults: InventoryDefaults,
  group: string,
  log?: LogFn
): DeviceDescriptor | null {
  const username = entry.username ?? defaults.username ?? defaults.admin_user
  let password = entry.password ?? defaults.password
  if (!password && username && defaults.user_password) {
    password = defaults.user_password[username]
  }

  if (!password) {
    if (log) log('warn', `No password found for ${entry.host}`)
    return null
  }
  if (!username) {
    if (log) log('warn', `No username found for ${entry.host}`)
    return null
  }

  return Object.freeze({
    host: entry.host,
    displayName: entry.name ?? entry.host,
    username,
    password,
    port: entry.port ?? defaults.port ?? DEFAULT_PORT,
    connectTimeoutSeconds: entry.timeout ?? defaults.timeout ?? DEFAULT_TIMEOUT_SECONDS,
    tags: Object.freeze([...new Set(entry.tags ?? [])]),
    group,
  })
}

// Resolve every host of an already-parsed inventory document
export function resolveInventory(document: unknown, log?: LogFn): DeviceDescriptor[] {
  const parsed = inventorySchema.safeParse(document ?? {})
  if (!parsed.success) {
    throw new Error(`Invalid inventory: ${describeIssues(parsed.error)}`)
  }

  const { defaults, host_groups: groups } = parsed.data
  const devices: DeviceDescriptor[] = []
  const seenHosts = new Set<string>()

  for (const [group, entries] of Object.entries(groups)) {
    for (const [index, raw] of (entries ?? []).entries()) {
      const entry = hostEntrySchema.safeParse(raw)
      if (!entry.success) {
        if (log) log('warn', `Skipping entry ${index} of group ${group}: ${describeIssues(entry.error)}`)
        continue
      }

      const device = resolveHost(entry.data, defaults, group, log)
      if (!device) continue

      if (seenHosts.has(device.host)) {
        if (log) log('warn', `Duplicate host ${device.host} in group ${group}`)
      }
      seenHosts.add(device.host)
      devices.push(device)
    }
  }

  return devices
}

// Load the YAML inventory; any load fault is logged once and yields no devices
export function loadInventory(filePath: string, log?: LogFn): DeviceDescriptor[] {
  try {
    const document: unknown = parseYaml(readFileSync(filePath, 'utf-8'))
    const devices = resolveInventory(document, log)
    if (log) log('info', `Loaded ${devices.length} devices from ${filePath}`)
    return devices
  } catch (err) {
    if (log) log('error', `Failed to load hosts from ${filePath}: ${errorMessage(err)}`)
    return []
  }
}
