/**
 * CLI UI module exports
 */

// Formatters
export { columnWidths, formatTableRow, formatTableSeparator } from "./formatters";
// Output
export { color, intro, message, outro, step, VERSION } from "./output";

import * as output from "./output";

export const ui = {
  intro: output.intro,
  outro: output.outro,
  step: output.step,
  message: output.message,
};
