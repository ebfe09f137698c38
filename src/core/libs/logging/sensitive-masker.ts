type MaskableRecord = Record<string, unknown>

// Plain objects only: errors and dates go to pino's serializers untouched.
function isRecord(value: unknown): value is MaskableRecord {
  if (typeof value !== 'object' || value === null) return false
  const prototype: unknown = Object.getPrototypeOf(value)
  return prototype === Object.prototype || prototype === null
}

/**
 * Masks secrets, credentials and password material before it reaches log output.
 */
export class SensitiveDataMasker {
  // Compared against the end of the normalized key, so `x-api-key` and
  // `refreshToken` hit `apikey` and `token`.
  private static readonly SENSITIVE_KEYS = new Set([
    'password',
    'passwordhash',
    'token',
    'secret',
    'authorization',
    'cookie',
    'apikey',
    'credential',
    'credentials',
    'databaseurl',
  ])

  private static readonly MASK_SUFFIX = '***'

  /**
   * Returns a copy of `data` with sensitive values masked, walking nested
   * objects and arrays.
   */
  static mask(data: MaskableRecord): MaskableRecord {
    const masked: MaskableRecord = { ...data }

    for (const [key, value] of Object.entries(masked)) {
      if (SensitiveDataMasker.isSensitiveKey(key)) {
        masked[key] = SensitiveDataMasker.maskValue(value)
      } else if (isRecord(value)) {
        masked[key] = SensitiveDataMasker.mask(value)
      } else if (Array.isArray(value)) {
        masked[key] = value.map((item: unknown) =>
          isRecord(item) ? SensitiveDataMasker.mask(item) : item,
        )
      }
    }

    return masked
  }

  /**
   * Keeps the first 4 characters of values longer than 4 characters.
   */
  static maskValue(value: unknown): string {
    if (value === null || value === undefined) {
      return SensitiveDataMasker.MASK_SUFFIX
    }

    const strValue = String(value)
    if (strValue.length <= 4) {
      return SensitiveDataMasker.MASK_SUFFIX
    }

    return `${strValue.substring(0, 4)}${SensitiveDataMasker.MASK_SUFFIX}`
  }

  private static normalize(key: string): string {
    return key.toLowerCase().replace(/[^a-z0-9]/g, '')
  }

  private static isSensitiveKey(key: string): boolean {
    const normalized = SensitiveDataMasker.normalize(key)
    for (const sensitive of SensitiveDataMasker.SENSITIVE_KEYS) {
      if (normalized.endsWith(sensitive)) return true
    }
    return false
  }

  static addSensitiveKeys(keys: string[]): void {
    for (const key of keys) {
      SensitiveDataMasker.SENSITIVE_KEYS.add(SensitiveDataMasker.normalize(key))
    }
  }
}
