export const normalizeUsername = (value?: string | null): string | null => {
  if (!value) {
    return null
  }
  const trimmed = value.trim().toLowerCase()
  return trimmed || null
}

export const emptyToNull = (value?: string | null): string | null => {
  if (value === undefined || value === null) {
    return null
  }
  const trimmed = value.trim()
  return trimmed ? trimmed : null
}
