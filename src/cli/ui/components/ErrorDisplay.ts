// Error Display Component for the packlens terminal UI

import { describeError } from '../../../errors'

export interface ErrorDisplayProps {
  title: string
  error: unknown
  /** Shown under the message, e.g. the path that failed to load */
  detail?: string
}

export interface ErrorDisplayElement {
  type: 'ErrorDisplay'
  props: ErrorDisplayProps
  message: string
}

export function ErrorDisplay(props: ErrorDisplayProps): ErrorDisplayElement {
  const message = typeof props.error === 'string' ? props.error : describeError(props.error)
  return {
    type: 'ErrorDisplay',
    props,
    message,
  }
}
