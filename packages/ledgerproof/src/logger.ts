import { debug } from "./format.js"

export const logger = (namespace: string) => debug(namespace)
