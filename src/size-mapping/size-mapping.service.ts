import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Papa from 'papaparse';
import { readFile } from 'fs/promises';
import { resolve as resolvePath } from 'path';
import { EnvironmentVariables } from '../config/env.validation';

export interface SizeMappingEntry {
    sizeId: number;
    remoteLabel: string;
}

type SizeMappingRow = Partial<Record<'local_value' | 'size_id' | 'remote_value', string>>;

/**
 * Local size label -> marketplace size id, loaded once from a CSV with the columns
 * local_value, size_id, remote_value.
 */
@Injectable()
export class SizeMappingService implements OnModuleInit {
    private readonly logger = new Logger(SizeMappingService.name);
    private entries = new Map<string, SizeMappingEntry>();

    constructor(private readonly configService: ConfigService<EnvironmentVariables, true>) {}

    async onModuleInit(): Promise<void> {
        const path = resolvePath(this.configService.get('SIZE_MAPPING_PATH', { infer: true }));
        const csvText = await readFile(path, 'utf8');
        this.load(csvText);
        this.logger.log(`Loaded ${this.size} size mappings from ${path}`);
    }

    load(csvText: string): void {
        const parsed = Papa.parse<SizeMappingRow>(csvText, { header: true, skipEmptyLines: true });
        if (parsed.errors.length > 0) {
            this.logger.warn(`Size mapping CSV had ${parsed.errors.length} errors; proceeding with valid rows`);
        }

        const entries = new Map<string, SizeMappingEntry>();
        parsed.data.forEach((row, index) => {
            const label = row.local_value?.trim() ?? '';
            const rawSizeId = row.size_id?.trim() ?? '';
            const sizeId = Number(rawSizeId);
            if (label === '' || rawSizeId === '' || !Number.isInteger(sizeId)) {
                this.logger.warn(`Skipping size mapping row ${index + 2}: ${JSON.stringify(row)}`);
                return;
            }
            if (entries.has(label)) {
                this.logger.warn(`Size label "${label}" mapped twice, keeping the later row`);
            }
            entries.set(label, { sizeId, remoteLabel: row.remote_value?.trim() ?? '' });
        });
        this.entries = entries;
    }

    resolve(label: string): SizeMappingEntry | null {
        return this.entries.get(label.trim()) ?? null;
    }

    get size(): number {
        return this.entries.size;
    }
}
