import type { ColumnDescriptor } from '../types';
import { columnNameSet } from '../lib/metadata';
import { MetadataLoader } from './loader';
import type { AnalysisDefinition } from './types';

export class AnalysisRegistry {
    private analyses: Map<string, AnalysisDefinition> = new Map();
    private loader: MetadataLoader;
    private initialized = false;

    constructor(loader?: MetadataLoader) {
        this.loader = loader || new MetadataLoader();
    }

    async init(config?: { catalogPath?: string }) {
        if (this.initialized) return;

        const catalog = await this.loader.loadAnalysisCatalog(config?.catalogPath);
        catalog.analyses.forEach(a => this.registerAnalysis(a));

        this.initialized = true;
    }

    registerAnalysis(analysis: AnalysisDefinition) {
        this.analyses.set(analysis.key, analysis);
    }

    getAnalysis(key: string): AnalysisDefinition | undefined {
        return this.analyses.get(key);
    }

    listAnalyses(): AnalysisDefinition[] {
        return Array.from(this.analyses.values());
    }

    /** Analyses whose required columns are all present, in catalog order. */
    listAvailable(columns: readonly ColumnDescriptor[]): AnalysisDefinition[] {
        const names = columnNameSet(columns);
        return this.listAnalyses().filter(a => a.required_columns.every(c => names.has(c)));
    }
}
