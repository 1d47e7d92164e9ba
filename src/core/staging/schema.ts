/**
 * Staging file Zod schemas and (de)serialization.
 *
 * Dates are ISO strings on disk and tag removal sets are sorted arrays.
 * Validated on read so a hand-edited or truncated file fails loudly instead
 * of producing half-formed entries.
 */
import { z } from 'zod'

import { createItemMap, sortedEntries, sortedValues } from './collections.js'
import { createEmptyState } from './state.js'
import type { Entry, State, TagEntry } from './types.js'
import { SERVICES, STATE_VERSION } from './types.js'


// ─────────────────────────────────────────────────────────────
// Base Schemas
// ─────────────────────────────────────────────────────────────

const DateSchema = z
    .string()
    .datetime({ offset: true })
    .transform((value) => new Date(value))

const OperationSchema = z.enum(['create', 'update', 'delete'])

export const RECOVERY_WINDOW_MIN = 7
export const RECOVERY_WINDOW_MAX = 30

const DeleteOptionsSchema = z.object({
    force: z.boolean().default(false),
    recoveryWindow: z.number().int().min(0).max(RECOVERY_WINDOW_MAX).default(0),
})

// ─────────────────────────────────────────────────────────────
// Entry Schemas
// ─────────────────────────────────────────────────────────────

const EntrySchema = z
    .object({
        operation: OperationSchema,
        value: z.string().optional(),
        description: z.string().optional(),
        stagedAt: DateSchema,
        baseModifiedAt: DateSchema.optional(),
        deleteOptions: DeleteOptionsSchema.optional(),
    })
    .superRefine((entry, ctx) => {

        const hasValue = entry.value !== undefined

        if (entry.operation === 'delete' && hasValue) {

            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'delete entries carry no value' })
        }

        if (entry.operation !== 'delete' && !hasValue) {

            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${entry.operation} entries require a value` })
        }
    })

const TagEntrySchema = z
    .object({
        add: z.record(z.string(), z.string()).default({}),
        remove: z.array(z.string()).default([]),
        stagedAt: DateSchema,
        baseModifiedAt: DateSchema.optional(),
    })
    .refine(
        (tagEntry) => Object.keys(tagEntry.add).length > 0 || tagEntry.remove.length > 0,
        { message: 'tag entries must add or remove at least one key' },
    )

/**
 * Name-keyed items read as `[name, item]` pairs. `z.record` skips a
 * `__proto__` key, which is a legal item name.
 */
const NamedItemsSchema = <T extends z.ZodTypeAny>(item: T) => z.preprocess(
    // Anything but a plain object fails as a missing map
    (value) => (typeof value === 'object' && value !== null && !Array.isArray(value) ? Object.entries(value) : undefined),
    z.array(z.tuple([z.string(), item])),
)

const ServiceMapSchema = <T extends z.ZodTypeAny>(item: T) => z.object({
    param: NamedItemsSchema(item).default({}),
    secret: NamedItemsSchema(item).default({}),
})

// ─────────────────────────────────────────────────────────────
// File Schema
// ─────────────────────────────────────────────────────────────

export const StateFileSchema = z.object({
    version: z.number().int().positive().default(STATE_VERSION),
    entries: ServiceMapSchema(EntrySchema).default({}),
    tags: ServiceMapSchema(TagEntrySchema).default({}),
})

export type StateFileInput = z.input<typeof StateFileSchema>

type ParsedEntry = z.output<typeof EntrySchema>
type ParsedTagEntry = z.output<typeof TagEntrySchema>


/**
 * JSON-ready shape of an Entry.
 */
interface SerializedEntry {

    operation: Entry['operation']
    value?: string
    description?: string
    stagedAt: string
    baseModifiedAt?: string
    deleteOptions?: { force: boolean; recoveryWindow: number }
}


/**
 * JSON-ready shape of a TagEntry.
 */
interface SerializedTagEntry {

    add: Record<string, string>
    remove: string[]
    stagedAt: string
    baseModifiedAt?: string
}


interface SerializedState {

    version: number
    entries: Record<string, Record<string, SerializedEntry>>
    tags: Record<string, Record<string, SerializedTagEntry>>
}


function serializeEntry(entry: Entry): SerializedEntry {

    const out: SerializedEntry = {
        operation: entry.operation,
        stagedAt: entry.stagedAt.toISOString(),
    }

    if (entry.value !== undefined) out.value = entry.value
    if (entry.description !== undefined) out.description = entry.description
    if (entry.baseModifiedAt) out.baseModifiedAt = entry.baseModifiedAt.toISOString()
    if (entry.deleteOptions) out.deleteOptions = { ...entry.deleteOptions }

    return out
}


function serializeTagEntry(tagEntry: TagEntry): SerializedTagEntry {

    const add: Record<string, string> = {}

    for (const [key, value] of sortedEntries(tagEntry.add)) {

        add[key] = value
    }

    const out: SerializedTagEntry = {
        add,
        remove: sortedValues(tagEntry.remove),
        stagedAt: tagEntry.stagedAt.toISOString(),
    }

    if (tagEntry.baseModifiedAt) out.baseModifiedAt = tagEntry.baseModifiedAt.toISOString()

    return out
}


function toEntry(parsed: ParsedEntry): Entry {

    const entry: Entry = { operation: parsed.operation, stagedAt: parsed.stagedAt }

    if (parsed.value !== undefined) entry.value = parsed.value
    if (parsed.description !== undefined) entry.description = parsed.description
    if (parsed.baseModifiedAt) entry.baseModifiedAt = parsed.baseModifiedAt
    if (parsed.deleteOptions) entry.deleteOptions = parsed.deleteOptions

    return entry
}


function toTagEntry(parsed: ParsedTagEntry): TagEntry {

    const tagEntry: TagEntry = {
        add: parsed.add,
        remove: new Set(parsed.remove),
        stagedAt: parsed.stagedAt,
    }

    if (parsed.baseModifiedAt) tagEntry.baseModifiedAt = parsed.baseModifiedAt

    return tagEntry
}


/**
 * Convert a state into its JSON text form. Keys are written in sorted order
 * so identical states serialize identically.
 */
export function serializeState(state: State): string {

    const out: SerializedState = { version: state.version, entries: {}, tags: {} }

    for (const service of SERVICES) {

        const entries = createItemMap<SerializedEntry>()
        const tags = createItemMap<SerializedTagEntry>()

        for (const [name, entry] of sortedEntries(state.entries[service])) {

            entries[name] = serializeEntry(entry)
        }

        for (const [name, tagEntry] of sortedEntries(state.tags[service])) {

            tags[name] = serializeTagEntry(tagEntry)
        }

        out.entries[service] = entries
        out.tags[service] = tags
    }

    return JSON.stringify(out, null, 2)
}


/**
 * Validate parsed JSON and build a State from it.
 *
 * @throws ZodError when the data does not match the file schema
 */
export function deserializeState(data: unknown): State {

    const parsed = StateFileSchema.parse(data)
    const state = createEmptyState()
    state.version = parsed.version

    for (const service of SERVICES) {

        for (const [name, entry] of parsed.entries[service]) {

            state.entries[service][name] = toEntry(entry)
        }

        for (const [name, tagEntry] of parsed.tags[service]) {

            state.tags[service][name] = toTagEntry(tagEntry)
        }
    }

    return state
}
