/**
 * Kernel template families
 */

import type { ITemplateRegistry } from '@kernloom/types';
import { SimpleTemplateRegistry } from '@kernloom/utils';
import { registerMapTemplates } from './map';

export * from './map';

export function registerBuiltinTemplates(registry: ITemplateRegistry): void {
    registerMapTemplates(registry);
}

export function createDefaultRegistry(): ITemplateRegistry {
    const registry = new SimpleTemplateRegistry();
    registerBuiltinTemplates(registry);
    return registry;
}
