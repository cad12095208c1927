export { generateId, generateTableId, type IdGenerator } from "./id";
export { warnInDevelopment } from "./warn";
