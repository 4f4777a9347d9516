/**
 * Stage 2: Model Discovery
 *
 * Decides which configured model handles each MIME type found by the scan,
 * and probes whether each model's provider answers.
 *
 * A MIME type goes to the first model whose capabilities cover its
 * top-level category; `application/*` falls back to a text model.
 */

import { fingerprintBytes, getLogger, LogCategory } from '@tidyfold/organizer-core';
import type { Fingerprint, Logger, WholeStageDefinition } from '@tidyfold/organizer-core';
import type { AIClient } from '../ai/ai-client';
import { discoveryResultCodec } from './codecs';
import { mimeCategory } from './scan';
import type { AIProvider, DiscoveryResult, ModelCapability, ModelInfo, ScanResult } from '../types';

export const DISCOVER_STAGE_ID = 'stage2';

export interface DiscoverOptions {
    models: ModelInfo[];
    /** Probe providers; when false every model counts as connected */
    verifyConnectivity: boolean;
    client: AIClient;
    logger?: Logger;
}

/**
 * Capabilities that can serve a MIME category, in preference order.
 */
export function capabilitiesFor(category: string): ModelCapability[] {
    switch (category) {
        case 'text':
            return ['text'];
        case 'image':
            return ['image'];
        case 'audio':
            return ['audio'];
        case 'video':
            return ['video'];
        default:
            return ['application', 'text'];
    }
}

/**
 * Map each MIME type to a model name. Types no model can serve are left out.
 */
export function mapMimeTypes(mimeTypes: readonly string[], models: readonly ModelInfo[]): Record<string, string> {
    const mapping: Record<string, string> = {};
    for (const mimeType of mimeTypes) {
        for (const capability of capabilitiesFor(mimeCategory(mimeType))) {
            const model = models.find(m => m.capabilities.includes(capability));
            if (model) {
                mapping[mimeType] = model.name;
                break;
            }
        }
    }
    return mapping;
}

/**
 * Build the stage-2 result. One availability probe per provider.
 */
export async function discoverModels(scan: ScanResult, options: DiscoverOptions): Promise<DiscoveryResult> {
    const logger = options.logger ?? getLogger();
    const mimeToModel = mapMimeTypes(scan.uniqueMimeTypes, options.models);
    const connectivity: Record<string, boolean> = {};
    const probed = new Map<AIProvider, boolean>();

    for (const model of options.models) {
        if (!options.verifyConnectivity) {
            connectivity[model.name] = true;
            continue;
        }

        let available = probed.get(model.provider);
        if (available === undefined) {
            const result = await options.client.checkAvailability(model.provider);
            available = result.available;
            probed.set(model.provider, available);
            if (!available) {
                logger.warn(LogCategory.AI, `Provider ${model.provider} is unavailable: ${result.reason ?? 'unknown reason'}`);
            }
        }
        connectivity[model.name] = available;
    }

    for (const mimeType of scan.uniqueMimeTypes) {
        if (mimeToModel[mimeType] === undefined) {
            logger.warn(LogCategory.AI, `No configured model can handle ${mimeType}`);
        }
    }

    return { models: options.models, mimeToModel, connectivity };
}

/**
 * True when every configured model's provider answered its probe.
 */
export function allConnected(discovery: DiscoveryResult): boolean {
    return Object.values(discovery.connectivity).every(Boolean);
}

/**
 * Live fingerprint: the scan result plus the model configuration.
 */
export function discoverFingerprint(scan: ScanResult, options: DiscoverOptions): Fingerprint {
    return fingerprintBytes(JSON.stringify({
        scan,
        models: options.models,
        verifyConnectivity: options.verifyConnectivity,
    }));
}

export function createDiscoverStage(options: DiscoverOptions): WholeStageDefinition<ScanResult, DiscoveryResult> {
    return {
        id: DISCOVER_STAGE_ID,
        codec: discoveryResultCodec,
        fingerprint: scan => discoverFingerprint(scan, options),
        compute: scan => discoverModels(scan, options),
        // An outage is not cached: the next run probes again
        shouldStore: result => allConnected(result),
    };
}
