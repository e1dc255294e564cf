export { optimize } from "./optimize";
