import type {Role} from '@ovpn-portal/schemas';

export type AuthenticatedIdentity = {
  subject: string;
  displayName: string;
  email?: string;
  groups: string[];
  roles: Role[];
};

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
