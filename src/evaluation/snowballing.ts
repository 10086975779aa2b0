import { DirectedGraph } from 'graphology';
import type { Citation, EvaluationReport, Study } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

export interface SnowballingRecall {
    /** Recall after following references of found studies */
    backwardRecall: number;
    /** Recall after following references and citing studies */
    backwardForwardRecall: number;
    backwardReached: string[];
    backwardForwardReached: string[];
}

/**
 * Build a directed citation graph over the GS. Edges point from the citing
 * study to the cited one; edges touching unknown studies are skipped.
 */
export function buildCitationGraph(gs: readonly Study[], citations: readonly Citation[]): DirectedGraph {
    const graph = new DirectedGraph();

    for (const study of gs) {
        if (!graph.hasNode(study.id)) graph.addNode(study.id);
    }

    let skipped = 0;
    for (const { from, to } of citations) {
        if (from === to || !graph.hasNode(from) || !graph.hasNode(to)) {
            skipped++;
            continue;
        }
        if (!graph.hasEdge(from, to)) graph.addEdge(from, to);
    }

    if (skipped > 0) {
        logger.debug({ skipped }, 'Citations outside the GS skipped');
    }
    logger.debug({ nodeCount: graph.order, edgeCount: graph.size }, 'Citation graph built');
    return graph;
}

/**
 * Breadth-first search from `starts`. 'out' follows references only;
 * 'both' also walks back to citing studies. Start nodes are included.
 */
export function reachableFrom(
    graph: DirectedGraph,
    starts: readonly string[],
    direction: 'out' | 'both'
): string[] {
    const visited = new Set<string>();
    const queue: string[] = [];

    for (const start of starts) {
        if (graph.hasNode(start) && !visited.has(start)) {
            visited.add(start);
            queue.push(start);
        }
    }

    for (let head = 0; head < queue.length; head++) {
        const node = queue[head] ?? '';
        const neighbors = direction === 'out' ? graph.outNeighbors(node) : graph.neighbors(node);
        for (const neighbor of neighbors) {
            if (!visited.has(neighbor)) {
                visited.add(neighbor);
                queue.push(neighbor);
            }
        }
    }

    return queue;
}

/**
 * GS recall once snowballing from the studies the search found is taken
 * into account.
 */
export function snowballingRecall(
    report: EvaluationReport,
    gs: readonly Study[],
    citations: readonly Citation[]
): SnowballingRecall {
    const graph = buildCitationGraph(gs, citations);
    const backwardReached = reachableFrom(graph, report.gsFound, 'out');
    const backwardForwardReached = reachableFrom(graph, report.gsFound, 'both');
    const gsSize = graph.order;

    return {
        backwardRecall: gsSize === 0 ? 0 : backwardReached.length / gsSize,
        backwardForwardRecall: gsSize === 0 ? 0 : backwardForwardReached.length / gsSize,
        backwardReached,
        backwardForwardReached,
    };
}
