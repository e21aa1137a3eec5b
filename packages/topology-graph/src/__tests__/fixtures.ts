import type { LogicalPlan, PhysicalPlan, PlanSource } from '@topograph/tracker-client';

export function wordCountLogicalPlan(): LogicalPlan {
  return {
    spouts: {
      word: { spoutType: 'kafka', spoutSource: 'words-topic', outputs: ['default'] }
    },
    bolts: {
      count: {
        inputs: [{ componentName: 'word', streamName: 'default', grouping: 'SHUFFLE' }],
        outputs: []
      }
    }
  };
}

/** Two spout instances and one bolt instance, all on container 1 behind stmgr-1. */
export function wordCountPhysicalPlan(): PhysicalPlan {
  return {
    brokers: {
      'stmgr-1': { id: 'stmgr-1', host: 'node-a.local', port: 6001, shellPort: 6002 }
    },
    spouts: { word: ['container_1_word_1', 'container_1_word_2'] },
    bolts: { count: ['container_1_count_3'] },
    instances: {
      container_1_word_1: { brokerId: 'stmgr-1' },
      container_1_word_2: { brokerId: 'stmgr-1' },
      container_1_count_3: { brokerId: 'stmgr-1' }
    }
  };
}

/** One spout instance on container 1 and one bolt instance on container 2. */
export function twoBrokerPhysicalPlan(): PhysicalPlan {
  return {
    brokers: {
      'stmgr-1': { id: 'stmgr-1', host: 'node-a.local', port: 6001, shellPort: 6002 },
      'stmgr-2': { id: 'stmgr-2', host: 'node-b.local', port: 6001, shellPort: 6002 }
    },
    spouts: { word: ['container_1_word_1'] },
    bolts: { count: ['container_2_count_2'] },
    instances: {
      container_1_word_1: { brokerId: 'stmgr-1' },
      container_2_count_2: { brokerId: 'stmgr-2' }
    }
  };
}

export class FakePlanSource implements PlanSource {
  readonly calls: string[] = [];
  logicalPlan: LogicalPlan | Error;
  physicalPlan: PhysicalPlan | Error;

  constructor(logicalPlan: LogicalPlan | Error, physicalPlan: PhysicalPlan | Error) {
    this.logicalPlan = logicalPlan;
    this.physicalPlan = physicalPlan;
  }

  async getLogicalPlan(cluster: string, environ: string, topologyId: string): Promise<LogicalPlan> {
    this.calls.push(`logical:${cluster}/${environ}/${topologyId}`);
    if (this.logicalPlan instanceof Error) {
      throw this.logicalPlan;
    }
    return this.logicalPlan;
  }

  async getPhysicalPlan(cluster: string, environ: string, topologyId: string): Promise<PhysicalPlan> {
    this.calls.push(`physical:${cluster}/${environ}/${topologyId}`);
    if (this.physicalPlan instanceof Error) {
      throw this.physicalPlan;
    }
    return this.physicalPlan;
  }
}
