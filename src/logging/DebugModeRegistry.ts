/**
 * Debug Mode Registry
 *
 * Per-component log level overrides. Module-scoped state with a reset for tests.
 *
 * Codec components register themselves when their module loads (e.g. "edi-parser",
 * "edi-xml"), so DEBUG/TRACE output can be enabled for a single stage of the
 * pipeline without flooding the rest.
 */

import { LogLevel, isLevelEnabled, parseLogLevel } from './LogLevel.js';

interface ComponentRegistration {
  name: string;
  description: string;
  levelOverride?: LogLevel;
}

export interface RegisteredComponent {
  name: string;
  description: string;
  effectiveLevel: LogLevel;
  hasOverride: boolean;
}

const registry = new Map<string, ComponentRegistration>();

/**
 * Register a loggable component. Re-registering keeps an override set earlier
 * (for example from the environment) unless a new default is given.
 */
export function registerComponent(name: string, description: string, defaultLevel?: LogLevel): void {
  const existing = registry.get(name);
  registry.set(name, {
    name,
    description,
    levelOverride: defaultLevel ?? existing?.levelOverride,
  });
}

/**
 * Override the level of one component. Unknown components are registered on the fly.
 */
export function setComponentLevel(name: string, level: LogLevel): void {
  const existing = registry.get(name);
  if (existing) {
    existing.levelOverride = level;
  } else {
    registry.set(name, { name, description: name, levelOverride: level });
  }
}

export function clearComponentLevel(name: string): void {
  const existing = registry.get(name);
  if (existing) {
    existing.levelOverride = undefined;
  }
}

/**
 * Effective level of a component. Child components ("edi-parser.header") inherit
 * the override of their closest registered ancestor.
 */
export function getEffectiveLevel(name: string, globalLevel: LogLevel): LogLevel {
  let current: string | undefined = name;
  while (current) {
    const override = registry.get(current)?.levelOverride;
    if (override) {
      return override;
    }
    const dot = current.lastIndexOf('.');
    current = dot > 0 ? current.substring(0, dot) : undefined;
  }
  return globalLevel;
}

export function shouldLog(name: string, messageLevel: LogLevel, globalLevel: LogLevel): boolean {
  return isLevelEnabled(messageLevel, getEffectiveLevel(name, globalLevel));
}

/**
 * All registered components with their effective levels, sorted by name.
 */
export function getRegisteredComponents(globalLevel: LogLevel): RegisteredComponent[] {
  const result: RegisteredComponent[] = [];
  for (const reg of registry.values()) {
    result.push({
      name: reg.name,
      description: reg.description,
      effectiveLevel: reg.levelOverride ?? globalLevel,
      hasOverride: reg.levelOverride !== undefined,
    });
  }
  return result.sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Apply overrides from configuration entries such as
 * ["edi-parser", "edi-xml:TRACE"]. Entries without a level get DEBUG.
 */
export function initFromEnv(debugComponents: string[]): void {
  for (const entry of debugComponents) {
    const colonIndex = entry.lastIndexOf(':');
    if (colonIndex > 0) {
      setComponentLevel(entry.substring(0, colonIndex), parseOverrideLevel(entry.substring(colonIndex + 1)));
    } else {
      setComponentLevel(entry, LogLevel.DEBUG);
    }
  }
}

function parseOverrideLevel(str: string): LogLevel {
  const upper = str.trim().toUpperCase();
  // Unrecognised level names default to DEBUG.
  if (upper === 'INFO' || upper === 'WARN' || upper === 'ERROR' || upper === 'TRACE') {
    return parseLogLevel(upper);
  }
  return LogLevel.DEBUG;
}

/**
 * Reset all registry state (for testing)
 */
export function resetDebugRegistry(): void {
  registry.clear();
}
