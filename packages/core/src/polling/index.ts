export {
  pollUntil,
  backoffDelay,
  abortableSleep,
  PollTimeoutError,
  PollAbortedError,
} from './poll';
export type { PollCheck, PollPolicy, PollOptions, PollResult } from './poll';
