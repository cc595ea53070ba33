export interface IDurationAllocator {
  /** Seven positive stage durations summing to a freshly drawn total. */
  allocate(): number[];
}
