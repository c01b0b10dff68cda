export type { Kind, URIS, URItoKind } from "./hkt.js";
export type { Alt, Alternative, Applicative, Apply, Chain, Functor, Monad } from "./typeclass.js";
