/**
 * Version specifier parsing.
 *
 * Grammar: `NAME [ABSOLUTE...] [SHIFT]`
 *
 * - ABSOLUTE: a prefix char followed by a value, e.g. `#3` or `:AWSPREVIOUS`
 * - SHIFT: one or more `~` each optionally followed by a count, e.g. `~`, `~2`, `~~`
 *
 * A prefix char that is not followed by a valid value char is part of the name,
 * so `/app/a#b` is a plain name for parameters.
 */
import { InvalidInputError } from '../errors.js'


/**
 * One absolute specifier kind.
 */
export interface SpecifierRule<A> {

    prefix: string
    isChar(char: string): boolean
    isSet(abs: A): boolean
    apply(value: string, abs: A): A
}


export interface VersionSpec<A> {

    name: string
    absolute: A
    shift: number
}


const isDigit = (char: string | undefined): boolean => char !== undefined && char >= '0' && char <= '9'
const isLetter = (char: string | undefined): boolean => char !== undefined && /^[A-Za-z]$/.test(char)


function isShiftStart(input: string, index: number): boolean {

    const next = input[index + 1]

    return next === undefined || next === '~' || isDigit(next)
}


/**
 * Parse a version spec with the given absolute rules.
 *
 * @example
 * ```typescript
 * parseVersionSpec('/app/url#3~1', [versionRule], () => ({}))
 * // { name: '/app/url', absolute: { version: 3 }, shift: 1 }
 * ```
 */
export function parseVersionSpec<A>(
    rawInput: string,
    rules: SpecifierRule<A>[],
    zero: () => A,
): VersionSpec<A> {

    const input = rawInput.trim()

    if (input === '') {

        throw new InvalidInputError('Empty name')
    }

    const nameEnd = findNameEnd(input, rules)
    const name = input.slice(0, nameEnd)

    if (name === '') {

        throw new InvalidInputError(`Empty name in '${input}'`)
    }

    let rest = input.slice(nameEnd)
    let absolute = zero()

    while (rest.length > 0 && rest[0] !== '~') {

        const rule = rules.find((candidate) => candidate.prefix === rest[0])

        if (!rule) {

            throw new InvalidInputError(`Unexpected '${rest[0]}' in '${input}'`)
        }

        let end = 1
        while (end < rest.length && rule.isChar(rest.charAt(end))) end++

        if (end === 1) {

            throw new InvalidInputError(`Missing value after '${rule.prefix}' in '${input}'`)
        }

        if (rule.isSet(absolute)) {

            throw new InvalidInputError(`Multiple absolute version specifiers in '${input}'`)
        }

        absolute = rule.apply(rest.slice(1, end), absolute)
        rest = rest.slice(end)
    }

    return { name, absolute, shift: parseShift(rest, input) }
}


function findNameEnd<A>(input: string, rules: SpecifierRule<A>[]): number {

    for (let i = 0; i < input.length; i++) {

        const char = input.charAt(i)
        const next = input[i + 1]

        if (char === '~') {

            if (isShiftStart(input, i)) return i

            if (isLetter(next)) {

                throw new InvalidInputError(`Ambiguous '~' in '${input}': use ~N for a version shift`)
            }

            continue
        }

        const rule = rules.find((candidate) => candidate.prefix === char)

        if (rule && next !== undefined && rule.isChar(next)) return i
    }

    return input.length
}


function parseShift(rest: string, input: string): number {

    let shift = 0
    let i = 0

    while (i < rest.length) {

        if (rest[i] !== '~') {

            throw new InvalidInputError(`Invalid version shift in '${input}'`)
        }

        i++

        let digits = ''
        while (i < rest.length && isDigit(rest[i])) digits += rest.charAt(i++)

        shift += digits === '' ? 1 : Number(digits)
    }

    return shift
}


// ─────────────────────────────────────────────────────────────
// Kind-specific grammars
// ─────────────────────────────────────────────────────────────

export interface ParameterAbsolute {

    version?: number
}


export interface SecretAbsolute {

    versionId?: string
    label?: string
}


const PARAMETER_RULES: SpecifierRule<ParameterAbsolute>[] = [
    {
        prefix: '#',
        isChar: isDigit,
        isSet: (abs) => abs.version !== undefined,
        apply: (value, abs) => ({ ...abs, version: Number(value) }),
    },
]

const isVersionIdChar = (char: string): boolean => /^[A-Za-z0-9-]$/.test(char)
const isLabelChar = (char: string): boolean => /^[A-Za-z0-9_-]$/.test(char)

const SECRET_RULES: SpecifierRule<SecretAbsolute>[] = [
    {
        prefix: '#',
        isChar: isVersionIdChar,
        isSet: (abs) => abs.versionId !== undefined || abs.label !== undefined,
        apply: (value, abs) => ({ ...abs, versionId: value }),
    },
    {
        prefix: ':',
        isChar: isLabelChar,
        isSet: (abs) => abs.versionId !== undefined || abs.label !== undefined,
        apply: (value, abs) => ({ ...abs, label: value }),
    },
]


/**
 * Parse `NAME[#VERSION][~SHIFT]`.
 *
 * @example
 * ```typescript
 * parseParameterSpec('/app/url#3')  // { name: '/app/url', absolute: { version: 3 }, shift: 0 }
 * parseParameterSpec('/app/url~2')  // { name: '/app/url', absolute: {}, shift: 2 }
 * ```
 */
export function parseParameterSpec(input: string): VersionSpec<ParameterAbsolute> {

    return parseVersionSpec(input, PARAMETER_RULES, () => ({}))
}


/**
 * Parse `NAME[#VERSION_ID | :LABEL][~SHIFT]`.
 *
 * @example
 * ```typescript
 * parseSecretSpec('app/db:AWSPREVIOUS')  // { name: 'app/db', absolute: { label: 'AWSPREVIOUS' }, shift: 0 }
 * ```
 */
export function parseSecretSpec(input: string): VersionSpec<SecretAbsolute> {

    return parseVersionSpec(input, SECRET_RULES, () => ({}))
}


export function hasParameterVersion(spec: VersionSpec<ParameterAbsolute>): boolean {

    return spec.absolute.version !== undefined || spec.shift > 0
}


export function hasSecretVersion(spec: VersionSpec<SecretAbsolute>): boolean {

    return spec.absolute.versionId !== undefined || spec.absolute.label !== undefined || spec.shift > 0
}
