export {
	type Type,
	makeType,
	decode,
	encode,
	property,
	unknownRecord,
	alt,
	altMonoid,
} from "./type.js";
