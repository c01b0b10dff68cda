export { type Lens, lens, prop, compose } from "./lens.js";
