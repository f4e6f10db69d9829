import { format } from "node:util"

/** Produces the body only when the record is going to be written. */
export type MessageThunk = () => string

export type MessageTemplate = string | MessageThunk

/**
 * Renders a printf-style template (`%s %d %i %f %j %o %O %%`).
 *
 * Directives, `%%` included, are only interpreted when arguments are given:
 * `info("100%%")` writes `100%%`, `info("%d%%", 100)` writes `100%`. A message
 * without arguments is therefore written exactly as passed, whatever it
 * contains. Surplus arguments are appended, missing ones leave their directive
 * in place.
 */
export function renderMessage(template: MessageTemplate, args: readonly unknown[]): string {
  const text = typeof template === "function" ? template() : template

  return args.length === 0 ? text : format(text, ...args)
}
