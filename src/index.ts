import { PersistentList } from "./lib/persistentList";

export {
  empty,
  cons,
  list,
  fromIterable,
  fromRange,
  type Predicate,
  type ElementEquality,
} from "./lib/persistentList";
export { EmptyListError, IndexOutOfRangeError } from "./errors";
export { PersistentList };

export default PersistentList;
