import {Handle} from './handle.js'

/**
 * Container run as a long-lived service. It starts when a container bound
 * to it executes, and stops once that execution ends.
 */
export class Service extends Handle {}
