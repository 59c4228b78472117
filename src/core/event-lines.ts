import type {QueryEvent} from '../providers/types.js'
import {eventLevel} from './subscribers/query-log-subscriber.js'

function shorten(text: string, max = 500): string {
  if (text.length <= max) return text
  return `${text.slice(0, max)}\n...[truncated]`
}

function describeEvent(event: QueryEvent): string {
  switch (event.type) {
    case 'tool_calling':
      return `TOOL_CALLING query=${event.queryId} Using OpenRouter tool calling for ${event.tool}`
    case 'request_start':
      return `REQUEST_START query=${event.queryId} model=${event.model} messages=${event.messageCount}`
    case 'backoff':
      return `BACKOFF query=${event.queryId} attempt=${event.attempt} delay_ms=${event.delayMs} Backoff exception: ${event.error}`
    case 'response':
      return `RESPONSE query=${event.queryId} model=${event.model} req_time=${event.reqTime.toFixed(3)}s in_tokens=${event.inTokens} out_tokens=${event.outTokens}`
    case 'tool_call_parsed':
      return `TOOL_CALL_PARSED query=${event.queryId} Successfully parsed tool call response for ${event.tool}`
    case 'tool_arguments_invalid':
      return `TOOL_ARGUMENTS_INVALID query=${event.queryId} tool=${event.tool} Error decoding function arguments: ${shorten(event.rawArguments)}`
  }
}

export function formatEventLine(event: QueryEvent, at: Date = new Date()): string {
  return `[${at.toISOString()}] ${eventLevel(event).toUpperCase()} ${describeEvent(event)}`
}
