import { createErrorHandler, formatAppError } from '@dexnav/errors'

export const [errorHandler, errorSub] = createErrorHandler({
  enableGlobalCapture: true,
  onError: (e) => console.error(formatAppError(e, 'dexnav')),
})
