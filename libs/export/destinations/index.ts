import type { DestinationFactory } from '../destination.js';
import { CdcsDestination } from './cdcs.js';
import { ElabftwDestination } from './elabftw.js';
import { LabArchivesDestination } from './labarchives.js';

/**
 * Built-in destination catalog, in registration order.
 * New integrations are added here.
 */
export const BUILTIN_DESTINATIONS: readonly DestinationFactory[] = Object.freeze([
    () => new CdcsDestination(),
    () => new LabArchivesDestination(),
    () => new ElabftwDestination()
]);

export { CdcsDestination, CdcsAuthenticationError } from './cdcs.js';
export { ElabftwDestination } from './elabftw.js';
export { LabArchivesDestination, LABARCHIVES_NOT_IMPLEMENTED } from './labarchives.js';
