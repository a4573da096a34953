/**
 * Device prefix for command identifiers: upper-cased, every run of
 * characters that is not a letter or digit collapsed to one underscore,
 * no leading or trailing underscore. Applying it twice changes nothing.
 */
export const cleanCommandName = (name: string): string =>
  name
    .toUpperCase()
    .replace(/[^\p{L}\p{N}]+/gu, "_")
    .replace(/^_+|_+$/g, "");

/**
 * Token for a vendor-named option (work mode, music mode, scene) inside a
 * command identifier.
 */
export const optionToken = (name: string, stripApostrophes = false): string => {
  const token = name.toUpperCase().replaceAll(" ", "_");
  return stripApostrophes ? token.replaceAll("'", "") : token;
};

/**
 * Case-insensitive comparison of a command suffix with an option name
 */
export const matchesOption = (
  suffix: string,
  name: string,
  stripApostrophes = false
): boolean =>
  optionToken(name, stripApostrophes) === suffix.toUpperCase();
