/**
 * Dependency injection container for the advisor library.
 *
 * @module lib/core/di
 */

import { createActivator } from "di-kit";

/**
 * - provide: Register service factory in DI container
 * - inject: Retrieve service instance from container
 * - init: Initialize all registered services
 * - override: Replace existing service registration
 */
export const { provide, inject, init, override } = createActivator("advisor");
