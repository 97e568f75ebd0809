export { openDatabase, withTransaction } from "./connection";
export { initSchema } from "./schema";
