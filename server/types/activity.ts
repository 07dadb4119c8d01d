/**
 * Activity registry types.
 * Shared by storage, routes and the landing page's JSON contract.
 */

export interface Activity {
  description: string;
  schedule: string;
  /** Descriptive only; signups are not checked against it. */
  max_participants: number;
  /** Student emails in signup order. */
  participants: string[];
}

/** Activity name -> record. The name is the unique key. */
export type ActivityMap = Record<string, Activity>;

/** Error kinds. HTTP status mapping is done by the router from `code` alone. */
export type RegistryErrorCode =
  | 'not_found'          // no activity with that name
  | 'invalid_operation'; // duplicate signup, or unregistering a non-member

export interface RegistryErrorInfo {
  code: RegistryErrorCode;
  message: string;
}

export interface RegistryResultSuccess {
  success: true;
  message: string;
}

export interface RegistryResultFailure {
  success: false;
  error: RegistryErrorInfo;
}

export type RegistryResult = RegistryResultSuccess | RegistryResultFailure;
