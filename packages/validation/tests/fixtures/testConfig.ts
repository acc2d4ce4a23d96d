import type { JobConfiguration } from '../../src/types/job.js'

export function validJob(): JobConfiguration {
  return {
    command: 'SELECT id, name FROM users WHERE id = @id',
    buffering: 'buffered',
    retry: { attempts: 1 },
    commitOnCancel: false,
    debug: false,
  }
}
