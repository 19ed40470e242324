/**
 * Key/value pairs cryptographically bound to a derived key.
 *
 * Insertion order carries no meaning: two contexts with the same pairs
 * always produce the same canonical encoding.
 */
export type Context = Readonly<Record<string, string>>;
