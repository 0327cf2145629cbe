// Stored login; the password is kept as a bcrypt hash
export type AuthUser = {
  id: number;
  username: string;
  passwordHash: string;
};

export type UsersData = {
  users: AuthUser[];
};
