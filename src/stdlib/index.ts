export {
  debounce,
  throttle,
  type DebounceOptions,
  type ThrottleOptions,
  type RateLimited,
} from './timing';
