export interface User {
  id: number;
  name: string;
  email: string;
  cvText: string | null;
  cvFilename: string | null;
  /** Replaced wholesale on every CV upload */
  cvVector: number[] | null;
  cvUpdatedAt: Date | null;
  createdAt: Date;
}

export interface NewUser {
  name: string;
  email: string;
}

export type MatchableUser = User & { cvVector: number[] };

export function hasCvVector(user: User): user is MatchableUser {
  return user.cvVector !== null && user.cvVector.length > 0;
}
