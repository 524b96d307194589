import { parsePhoneNumberFromString } from 'libphonenumber-js'
import { InvalidPhoneNumberError } from './errors'

export type ParsedPhone = { number: string; countryCallingCode: string }

export function parsePhone(value: string): ParsedPhone {
  const parsed = parsePhoneNumberFromString(value.trim())
  if (!parsed || !parsed.isPossible()) throw new InvalidPhoneNumberError(value)
  return { number: parsed.number, countryCallingCode: parsed.countryCallingCode }
}

export function isPhone(value: string): boolean {
  return parsePhoneNumberFromString(value.trim())?.isPossible() ?? false
}

/** E.164 form, e.g. "+33612345678". */
export function toE164(value: string): string {
  return parsePhone(value).number
}
