export { debug, isDebug, setDebug } from "./debug"
