export const name = "not an engine";
