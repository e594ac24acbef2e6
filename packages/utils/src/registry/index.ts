import type { ITemplateRegistry, TemplateImpl } from "@kernloom/types";

export class SimpleTemplateRegistry implements ITemplateRegistry {
    private templates = new Map<string, TemplateImpl>();

    register(opType: string, impl: TemplateImpl): void {
        this.templates.set(opType, impl);
    }

    find(opType: string): TemplateImpl | undefined {
        return this.templates.get(opType);
    }

    has(opType: string): boolean {
        return this.templates.has(opType);
    }

    keys(): string[] {
        return [...this.templates.keys()];
    }
}
