export interface UserRecord {
  username: string;
  passwordHash: string;
  roles: string[];
}

