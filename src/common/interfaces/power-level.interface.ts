export enum PowerLevel {
  EDUCATOR = 'EDUCATOR',
  USER = 'USER',
  UNREGISTERED = 'UNREGISTERED',
}

/** Roles that are written to storage. UNREGISTERED is the absence of one. */
export type StoredPowerLevel = Exclude<PowerLevel, PowerLevel.UNREGISTERED>;

export interface RoleAssignment {
  identity: string;
  powerLevel: PowerLevel;
}
