export {
	type Semigroup,
	type Monoid,
	makeMonoid,
	concatAll,
	reverse,
	stringMonoid,
	sumMonoid,
	productMonoid,
	allMonoid,
	anyMonoid,
	arrayMonoid,
} from "./monoid.js";

export { applicativeMonoid, alternativeMonoid, altMonoid } from "./constructors.js";
