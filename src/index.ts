/**
 * Main entry point for Azure Functions v4
 *
 * Importing the function files registers their timers with the shared
 * @azure/functions app object.
 */

import { initializeSentry } from './lib/utils/sentry';
import { initializeTelemetry } from './lib/utils/telemetry';

initializeSentry('azure-functions');
initializeTelemetry();

import './gameThreadTimer';
import './sidebarTimer';
