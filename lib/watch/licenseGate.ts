export type LicenseStatus = {
  ok: boolean;
  message: string;
};

/**
 * Host-supplied license check, run once before the first capture.
 * Token validation lives with the host application.
 */
export interface LicenseGate {
  check(): Promise<LicenseStatus>;
}
