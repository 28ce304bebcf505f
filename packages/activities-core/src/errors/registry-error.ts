/**
 * Registry error codes
 */
export type RegistryErrorCode =
  | 'ACTIVITY_NOT_FOUND'
  | 'PARTICIPANT_NOT_FOUND'
  | 'ALREADY_REGISTERED'
  | 'ACTIVITY_FULL';

/**
 * Rejected registry operation. All codes are client-input errors.
 */
export class RegistryError extends Error {
  constructor(
    message: string,
    public readonly code: RegistryErrorCode
  ) {
    super(message);
    this.name = 'RegistryError';
  }
}

export class ActivityNotFoundError extends RegistryError {
  constructor(public readonly activityName: string) {
    super('Activity not found', 'ACTIVITY_NOT_FOUND');
    this.name = 'ActivityNotFoundError';
  }
}

export class ParticipantNotFoundError extends RegistryError {
  constructor(
    public readonly activityName: string,
    public readonly email: string
  ) {
    super('Participant not found in this activity', 'PARTICIPANT_NOT_FOUND');
    this.name = 'ParticipantNotFoundError';
  }
}

export class AlreadyRegisteredError extends RegistryError {
  constructor(
    public readonly activityName: string,
    public readonly email: string
  ) {
    super('Student is already signed up for this activity', 'ALREADY_REGISTERED');
    this.name = 'AlreadyRegisteredError';
  }
}

export class ActivityFullError extends RegistryError {
  constructor(
    public readonly activityName: string,
    public readonly maxParticipants: number
  ) {
    super('Activity is full', 'ACTIVITY_FULL');
    this.name = 'ActivityFullError';
  }
}

/**
 * Invalid seed data; raised while building a registry
 */
export class SeedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SeedError';
  }
}
