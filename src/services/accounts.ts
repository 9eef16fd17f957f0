import { users, type User } from "../models/user.model";

export type UserCriteria = Partial<User>;

const isUserField = (key: string): key is keyof User =>
  key === "id" || key === "name" || key === "username";

export const listUsers = (): readonly User[] => users;

export const getUser = (id: string): User | undefined =>
  listUsers().find((user) => user.id === id);

// Every criterion has to match. A key the record does not have only matches
// an undefined value; an empty criteria object matches the first user
export const getUserBy = (criteria: UserCriteria): User | undefined => {
  const entries: [string, unknown][] = Object.entries(criteria);
  return listUsers().find((user) =>
    entries.every(([key, expected]) =>
      isUserField(key) ? user[key] === expected : expected === undefined
    )
  );
};
