/**
 * @circles/sdk: one import for the whole client core
 *
 * Usage:
 *   import { createCirclesClient, StaticTokenAuth } from '@circles/sdk';
 *   const circles = createCirclesClient(new StaticTokenAuth(token));
 *   await circles.picker.open();
 */

export * from '@circles/core';
export * from '@circles/interests';
export * from '@circles/matching';
export * from '@circles/recommendations';
export * from './client';
