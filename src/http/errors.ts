import { STATUS_CODES } from 'http'
import type { ErrorRequestHandler, RequestHandler } from 'express'
import { isPlannerError, PlannerErrorCode } from '../errors'
import type { Logger } from '../logger'

const STATUS_BY_CODE: Record<PlannerErrorCode, number> = {
  [PlannerErrorCode.VALIDATION]: 400,
  [PlannerErrorCode.PARSE_ERROR]: 400,
  [PlannerErrorCode.INVALID_DATA]: 400,
  [PlannerErrorCode.NOT_FOUND]: 404,
  [PlannerErrorCode.DUPLICATE_KEY]: 409,
}

export function statusForCode(code: PlannerErrorCode): number {
  return STATUS_BY_CODE[code]
}

/** Client errors raised by middleware (body-parser sets `status`). */
function clientStatusOf(err: unknown): number | null {
  if (
    typeof err === 'object' &&
    err !== null &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  ) {
    return err.status
  }
  return null
}

export const notFoundHandler: RequestHandler = (req, res) => {
  res.status(404).json({ error: `Route ${req.method} ${req.path} not found` })
}

export function errorHandler(log: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    if (isPlannerError(err)) {
      const status = statusForCode(err.code)
      log.debug(`[http] ${req.method} ${req.path} -> ${status}:`, err.message)
      res.status(status).json({ error: err.message })
      return
    }

    const clientStatus = clientStatusOf(err)
    if (clientStatus !== null) {
      res.status(clientStatus).json({ error: STATUS_CODES[clientStatus] ?? 'Bad Request' })
      return
    }

    log.error(`[http] ${req.method} ${req.path} failed:`, err)
    res.status(500).json({ error: 'Internal server error' })
  }
}
