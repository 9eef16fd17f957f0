export interface User {
  id?: string;
  name?: string; // May hold several words, views show the first one
  username?: string;
}

//Hardcoded seed users, never mutated

export const users: readonly User[] = Object.freeze([
  Object.freeze({ id: "1", name: "José", username: "josevalim" }),
  Object.freeze({ id: "2", name: "Bruce", username: "redrapids" }),
  Object.freeze({ id: "3", name: "Chris", username: "chrismccord" }),
]);
