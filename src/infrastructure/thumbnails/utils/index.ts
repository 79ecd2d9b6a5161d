export { Semaphore } from './Semaphore';
export { SingleFlight } from './SingleFlight';
