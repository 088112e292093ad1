/**
 * Framework Test - Target Table
 *
 * Static per-target facts. Every mapping over Target is an exhaustive switch,
 * so adding a target fails type-checking until each mapping handles it.
 */

import { TARGETS, type Target, type TargetDescriptor } from './types';
import { UnsupportedTargetError } from './errors';

export function assertNever(value: never): never {
  throw new UnsupportedTargetError(String(value));
}

export function isTarget(value: string): value is Target {
  return (TARGETS as readonly string[]).includes(value);
}

/**
 * Narrow a configured target name, failing on anything unknown.
 */
export function parseTarget(value: string): Target {
  if (!isTarget(value)) {
    throw new UnsupportedTargetError(value);
  }
  return value;
}

export function describeTarget(target: Target): TargetDescriptor {
  switch (target) {
    case 'ios_x64':
      return { target, family: 'ios', architecture: 'x86_64', simulator: true, sdkName: 'iphonesimulator', osVersionMin: '9.0' };
    case 'ios_arm32':
      return { target, family: 'ios', architecture: 'armv7', simulator: false, sdkName: 'iphoneos', osVersionMin: '9.0' };
    case 'ios_arm64':
      return { target, family: 'ios', architecture: 'arm64', simulator: false, sdkName: 'iphoneos', osVersionMin: '9.0' };
    case 'tvos_x64':
      return { target, family: 'tvos', architecture: 'x86_64', simulator: true, sdkName: 'appletvsimulator', osVersionMin: '9.0' };
    case 'tvos_arm64':
      return { target, family: 'tvos', architecture: 'arm64', simulator: false, sdkName: 'appletvos', osVersionMin: '9.0' };
    case 'macos_x64':
      return { target, family: 'macos', architecture: 'x86_64', simulator: false, sdkName: 'macosx', osVersionMin: '10.11' };
    case 'watchos_arm32':
      return { target, family: 'watchos', architecture: 'armv7k', simulator: false, sdkName: 'watchos', osVersionMin: '2.0' };
    case 'watchos_arm64':
      return { target, family: 'watchos', architecture: 'arm64_32', simulator: false, sdkName: 'watchos', osVersionMin: '2.0' };
    case 'watchos_x64':
      return { target, family: 'watchos', architecture: 'x86_64', simulator: true, sdkName: 'watchsimulator', osVersionMin: '2.0' };
    case 'watchos_x86':
      return { target, family: 'watchos', architecture: 'i386', simulator: true, sdkName: 'watchsimulator', osVersionMin: '2.0' };
    default:
      return assertNever(target);
  }
}

/**
 * Swift target triple, e.g. "arm64_32-apple-watchos2.0".
 */
export function swiftTargetTriple(descriptor: TargetDescriptor): string {
  const os = descriptor.family === 'macos' ? 'macosx' : descriptor.family;
  return `${descriptor.architecture}-apple-${os}${descriptor.osVersionMin}`;
}

/**
 * Name of the variable that points the test binary at the Swift runtime.
 * Simulator binaries are launched through simctl, which forwards only
 * SIMCTL_CHILD_-prefixed variables (prefix stripped) to the child.
 */
export function libraryPathVariable(target: Target): string {
  switch (target) {
    case 'ios_x64':
    case 'tvos_x64':
    case 'watchos_x64':
    case 'watchos_x86':
      return 'SIMCTL_CHILD_DYLD_LIBRARY_PATH';
    case 'ios_arm32':
    case 'ios_arm64':
    case 'tvos_arm64':
    case 'macos_x64':
    case 'watchos_arm32':
    case 'watchos_arm64':
      return 'DYLD_LIBRARY_PATH';
    default:
      return assertNever(target);
  }
}

/**
 * SDK used for bitcode validation, or null when the validator cannot
 * handle the target (it has no simulator support).
 */
export function bitcodeSdkFor(target: Target): string | null {
  switch (target) {
    case 'ios_x64':
    case 'tvos_x64':
    case 'watchos_x64':
    case 'watchos_x86':
      return null;
    case 'ios_arm32':
    case 'ios_arm64':
      return 'iphoneos';
    case 'macos_x64':
      return 'macosx';
    case 'tvos_arm64':
      return 'appletvos';
    case 'watchos_arm32':
    case 'watchos_arm64':
      return 'watchos';
    default:
      return assertNever(target);
  }
}
