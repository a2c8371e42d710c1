import { bench, group, run } from "mitata";
import { fromRange } from "../src";

const SIZE = 10_000;
const numbers = fromRange(1, SIZE);
const array = numbers.toArray();

group("prepend one element", () => {
  bench("persistent list", () => {
    numbers.prepend(0);
  });
  bench("array spread", () => {
    [0, ...array];
  });
});

group("concatenate", () => {
  bench("persistent list", () => {
    numbers.concat(numbers);
  });
  bench("array concat", () => {
    array.concat(array);
  });
});

group("sum", () => {
  bench("persistent list foldLeft", () => {
    numbers.foldLeft(0, (acc, n) => acc + n);
  });
  bench("array reduce", () => {
    array.reduce((acc, n) => acc + n, 0);
  });
});

await run();
