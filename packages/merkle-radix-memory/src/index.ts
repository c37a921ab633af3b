export { Tree } from "./Tree.js"
