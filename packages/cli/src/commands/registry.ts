import { doctor } from "./doctor/index.js";

export const baseCommands = {
  doctor,
};
