export type KeyInput =
  | { readonly kind: "Char"; readonly char: string }
  | { readonly kind: "Quit" };
