/**
 * Checks worth running for each result status.
 */

import { ResultStatus } from '../core/types.js';

export function suggestChecks(status: ResultStatus): string[] {
  switch (status) {
    case ResultStatus.FAILURE_USER:
      return ['Validate input parameters', 'Check request format'];
    case ResultStatus.FAILURE_SYSTEM:
      return ['Check system resources', 'Verify provider dependencies'];
    case ResultStatus.FAILURE_CONFIG:
      return ['Validate configuration files', 'Check environment variables'];
    case ResultStatus.FAILURE_RESOURCE:
      return ['Check quotas and rate limits', 'Review timeout settings'];
    case ResultStatus.SUCCESS_PARTIAL:
    case ResultStatus.SUCCESS_ACCEPTABLE:
      return ['Review output quality against the request'];
    case ResultStatus.SUCCESS_PERFECT:
      return [];
    default: {
      const unreachable: never = status;
      throw new Error(`Unknown result status: ${String(unreachable)}`);
    }
  }
}
