/**
 * Processing record states - every claimed event identifier is in one of these
 */
export enum ProcessingStatus {
  /**
   * Claimed; a handler is running or the attempt was abandoned mid-flight
   */
  PENDING = 'pending',

  /**
   * Handler ran and reported success
   */
  DONE = 'done',

  /**
   * Handler ran and reported (or threw) a failure
   */
  FAILED = 'failed',
}

/**
 * Terminal states a processing attempt can be marked with
 */
export type CompletedStatus = ProcessingStatus.DONE | ProcessingStatus.FAILED;
