/**
 * Host registry of packet-logger output modules. A module registers a context
 * constructor plus its per-packet and per-lane callbacks; sub-modules additionally
 * name the parent output whose sink they share.
 */

import type { PacketCondition } from './condition.js';
import type { ModuleContext, StandaloneContextOptions } from './context.js';
import type { JsonOutputContext } from './eve.js';
import type { PacketLogger } from './formatter.js';
import type { ThreadLocalState } from './thread.js';
import type { SinkConfig } from './types.js';

export interface PacketLoggerCallbacks {
  loggerId: string;
  moduleName: string;
  /** Registration key; sub-modules use `<parent>.<type>`. */
  confName: string;
  condition: PacketCondition;
  logger: PacketLogger;
  threadInit: (context: ModuleContext) => ThreadLocalState;
  threadDeinit: (state: ThreadLocalState | null) => void;
}

export interface PacketModule extends PacketLoggerCallbacks {
  initContext: (conf: SinkConfig | undefined, options: StandaloneContextOptions) => ModuleContext;
}

export interface PacketSubModule extends PacketLoggerCallbacks {
  parentName: string;
  initContext: (conf: SinkConfig | undefined, parent: JsonOutputContext) => ModuleContext;
}

export interface OutputRegistry {
  registerPacketModule(module: PacketModule): void;
  registerPacketSubModule(module: PacketSubModule): void;
  getPacketModule(confName: string): PacketModule | undefined;
  /** Looks up `<parentName>.<type>`. */
  getPacketSubModule(parentName: string, type: string): PacketSubModule | undefined;
  listConfNames(): string[];
}

export function createOutputRegistry(): OutputRegistry {
  const modules = new Map<string, PacketModule>();
  const subModules = new Map<string, PacketSubModule>();

  function assertFree(confName: string): void {
    if (modules.has(confName) || subModules.has(confName)) {
      throw new Error(`output module ${confName} is already registered`);
    }
  }

  return {
    registerPacketModule(module: PacketModule): void {
      assertFree(module.confName);
      modules.set(module.confName, module);
    },

    registerPacketSubModule(module: PacketSubModule): void {
      assertFree(module.confName);
      if (!module.confName.startsWith(`${module.parentName}.`)) {
        throw new Error(`sub-module ${module.confName} must be keyed under ${module.parentName}`);
      }
      subModules.set(module.confName, module);
    },

    getPacketModule(confName: string): PacketModule | undefined {
      return modules.get(confName);
    },

    getPacketSubModule(parentName: string, type: string): PacketSubModule | undefined {
      return subModules.get(`${parentName}.${type}`);
    },

    listConfNames(): string[] {
      return [...modules.keys(), ...subModules.keys()];
    },
  };
}
