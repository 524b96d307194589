import { z } from 'zod'
import { ConfigurationError } from './errors'

export type JsonPrimitive = string | number | boolean | null
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue }
export type JsonObject = { [key: string]: JsonValue }

const primitive = z.union([z.string(), z.number().finite(), z.boolean(), z.null()])

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([primitive, z.array(JsonValueSchema), z.record(JsonValueSchema)])
)

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema)

function deepFreeze<T extends JsonValue>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) deepFreeze(child)
    Object.freeze(value)
  }
  return value
}

function freeze<T extends JsonValue>(schema: z.ZodType<T>, value: unknown, what: string): T {
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue && issue.path.length > 0 ? ` at "${issue.path.join('.')}"` : ''
    throw new ConfigurationError(`${what} is not JSON-serializable${where}`)
  }
  return deepFreeze(parsed.data)
}

/**
 * Validates a computed context and returns a detached, deeply frozen copy.
 * Later changes to whatever the context was computed from cannot reach it.
 */
export function freezeContext(value: unknown, typeName: string): JsonObject {
  return freeze(JsonObjectSchema, value, `Context of type "${typeName}"`)
}

export function freezeData(value: unknown, typeName: string): JsonValue {
  return freeze(JsonValueSchema, value, `Data for type "${typeName}"`)
}
