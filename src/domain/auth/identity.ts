/**
 * Identity domain entity: the owner every credential and project resolves to.
 */
export interface Identity {
  readonly id: number;
  readonly email: string;
  readonly passwordHash: string;
  readonly createdAt: Date;
}

export interface NewIdentity {
  email: string;
  passwordHash: string;
}
