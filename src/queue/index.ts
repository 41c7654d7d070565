export { BackpressureQueue, type BackpressureQueueOptions } from './BackpressureQueue.js';
export { BoundedRingBuffer, type RingBufferMetrics } from './BoundedRingBuffer.js';
export { CapacityExceededError, QueueClosedError, QueueConsumerError } from './errors.js';
