export { harness } from "./harness";
