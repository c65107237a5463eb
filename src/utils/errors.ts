export type ServiceError = Error & { statusCode: number }

export const serviceError = (statusCode: number, message: string): ServiceError =>
  Object.assign(new Error(message), { statusCode })

export const notFound = (what: string): ServiceError => serviceError(404, `${what} not found`)

export const forbidden = (): ServiceError => serviceError(403, 'Forbidden')

export const badRequest = (message: string): ServiceError => serviceError(400, message)

export const getErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
