import {z} from 'zod'

export type JsonPrimitive = string | number | boolean | null
export type JsonValue = JsonPrimitive | JsonValue[] | {[key: string]: JsonValue}
export type JsonObject = {[key: string]: JsonValue}

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
)

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema)

export function cloneJson<T extends JsonValue>(value: T): T {
  return structuredClone(value)
}
