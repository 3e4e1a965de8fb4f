import { ArtifactStorage } from '../persistence/artifact-storage';
import { defineModuleSchema } from '../persistence/module-schema';
import { NAMESPACES } from './namespaces';
import { BriefNormalizer, IntakeAdapter } from './intake/intake.adapter';
import { BriefAnswerSchema, BriefSchema } from './intake/intake.schema';
import { StrategyAdapter, StrategyGenerator } from './strategy/strategy.adapter';
import { StrategyDocumentSchema, StrategyPillarSchema } from './strategy/strategy.schema';
import { DraftWriter, ProductionAdapter } from './production/production.adapter';
import { DraftAssetSchema, ProductionDraftSchema } from './production/production.schema';
import { QcAdapter, QualityEvaluator } from './qc/qc.adapter';
import { QcIssueSchema, QcResultSchema } from './qc/qc.schema';
import { DeliveryAdapter, DeliveryPackager } from './delivery/delivery.adapter';
import { DeliveryFileSchema, DeliveryPackageSchema } from './delivery/delivery.schema';

export const MODULE_SCHEMAS = {
    intake: defineModuleSchema(NAMESPACES.intake, 'intake_briefs', 'intake_answers'),
    strategy: defineModuleSchema(NAMESPACES.strategy, 'strategy_documents', 'strategy_pillars'),
    production: defineModuleSchema(NAMESPACES.production, 'production_drafts', 'production_assets'),
    qc: defineModuleSchema(NAMESPACES.qc, 'qc_results', 'qc_issues'),
    delivery: defineModuleSchema(NAMESPACES.delivery, 'delivery_packages', 'delivery_files'),
};

/** The external black boxes each module delegates its real work to. */
export interface Collaborators {
    normalizer: BriefNormalizer;
    generator: StrategyGenerator;
    writer: DraftWriter;
    evaluator: QualityEvaluator;
    packager: DeliveryPackager;
}

export interface PipelinePorts {
    intake: IntakeAdapter;
    strategy: StrategyAdapter;
    production: ProductionAdapter;
    qc: QcAdapter;
    delivery: DeliveryAdapter;
}

/** Claims every module namespace on `storage`; call once per storage. */
export function createModuleAdapters(storage: ArtifactStorage, collaborators: Collaborators): PipelinePorts {
    return {
        intake: new IntakeAdapter(
            storage.claim(MODULE_SCHEMAS.intake, BriefSchema, BriefAnswerSchema),
            collaborators.normalizer,
        ),
        strategy: new StrategyAdapter(
            storage.claim(MODULE_SCHEMAS.strategy, StrategyDocumentSchema, StrategyPillarSchema),
            collaborators.generator,
        ),
        production: new ProductionAdapter(
            storage.claim(MODULE_SCHEMAS.production, ProductionDraftSchema, DraftAssetSchema),
            collaborators.writer,
        ),
        qc: new QcAdapter(
            storage.claim(MODULE_SCHEMAS.qc, QcResultSchema, QcIssueSchema),
            collaborators.evaluator,
        ),
        delivery: new DeliveryAdapter(
            storage.claim(MODULE_SCHEMAS.delivery, DeliveryPackageSchema, DeliveryFileSchema),
            collaborators.packager,
        ),
    };
}

export { NAMESPACES } from './namespaces';
export { ModuleAdapter, readUpstream } from './module-adapter';
export type { ArtifactBody, Upstream } from './module-adapter';
export { succeed, fail, unwrap, toStepError } from './collaborator';
export type { CollaboratorResult, FailureKind } from './collaborator';
export type { BriefNormalizer, StrategyGenerator, DraftWriter, QualityEvaluator, DeliveryPackager };
export type { ClientRequest } from './intake/intake.schema';
export { createLocalCollaborators } from './local-collaborators';
