import { succeed } from './collaborator';
import type { Collaborators } from './index';

const PASS_SCORE = 70;

/**
 * Deterministic collaborators for local runs: no model calls, no network.
 * The QC score drops 10 points per "TODO" left in the draft body.
 */
export function createLocalCollaborators(): Collaborators {
    return {
        normalizer: {
            async normalize(request) {
                return succeed({
                    clientName: request.clientName.trim(),
                    industry: request.industry.trim().toLowerCase(),
                    objective: request.goals.join('; '),
                    audience: request.audience.trim(),
                    channels: request.channels,
                    answers: Object.entries(request.answers).map(([question, answer]) => ({ question, answer })),
                });
            },
        },
        generator: {
            async generate(brief) {
                const { clientName, industry, audience, channels } = brief.payload;
                return succeed({
                    positioning: `${clientName}: the ${industry} partner ${audience} can rely on`,
                    tone: 'confident',
                    pillars: channels.map(channel => ({
                        title: `${channel} presence`,
                        description: `Show ${audience} what ${clientName} delivers, on ${channel}`,
                        channel,
                    })),
                });
            },
        },
        writer: {
            async write(strategy) {
                return succeed({
                    title: strategy.payload.positioning,
                    body: strategy.items.map(pillar => pillar.description).join('\n'),
                    assets: strategy.items.map(pillar => ({
                        kind: 'post' as const,
                        channel: pillar.channel,
                        content: `${pillar.title}: ${pillar.description}`,
                    })),
                });
            },
        },
        evaluator: {
            async evaluate(draft) {
                const todos = draft.payload.body.split('TODO').length - 1;
                const score = Math.max(0, 100 - todos * 10);
                return succeed({
                    passed: score >= PASS_SCORE,
                    score,
                    issues: todos > 0 ? [{ severity: 'major' as const, message: `${todos} unresolved TODO markers` }] : [],
                });
            },
        },
        packager: {
            async package(draft) {
                return succeed({
                    files: [
                        { name: 'draft.md', mediaType: 'text/markdown', content: `# ${draft.payload.title}\n\n${draft.payload.body}` },
                        ...draft.items.map((asset, index) => ({
                            name: `${asset.channel}-${index + 1}.txt`,
                            mediaType: 'text/plain',
                            content: asset.content,
                        })),
                    ],
                });
            },
        },
    };
}
