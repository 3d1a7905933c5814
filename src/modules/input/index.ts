export { Input, getInput, resetInput } from "./input.js";
