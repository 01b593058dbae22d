import { CacheError } from '../../utils/errors';
import { DependencyGraph } from './dependency-graph';

describe('DependencyGraph', () => {
  function hierarchy(): DependencyGraph {
    const graph = new DependencyGraph();
    graph.addChain(['acme', 'acme/ax1', 'acme/ax1/uart', 'artifact:acme/ax1/uart_hal.hpp']);
    graph.addChain(['acme', 'acme/ax1', 'acme/ax1/timer', 'artifact:acme/ax1/timer_hal.hpp']);
    graph.addChain(['acme', 'acme/ax2', 'acme/ax2/uart', 'artifact:acme/ax2/uart_hal.hpp']);
    return graph;
  }

  it('collects transitive dependents', () => {
    const graph = hierarchy();

    expect([...graph.dependentsOf('acme/ax1')].sort()).toEqual([
      'acme/ax1/timer',
      'acme/ax1/uart',
      'artifact:acme/ax1/timer_hal.hpp',
      'artifact:acme/ax1/uart_hal.hpp',
    ]);
    expect(graph.dependentsOf('acme').size).toBe(8);
    expect(graph.childrenOf('acme')).toEqual(['acme/ax1', 'acme/ax2']);
  });

  it('accepts an edge that already exists', () => {
    const graph = hierarchy();
    graph.addEdge('acme', 'acme/ax1');
    expect(graph.childrenOf('acme')).toEqual(['acme/ax1', 'acme/ax2']);
  });

  it('rejects edges that would close a cycle and leaves the graph unchanged', () => {
    const graph = hierarchy();

    expect(() => graph.addEdge('acme/ax1/uart', 'acme')).toThrow(CacheError);
    expect(() => graph.addEdge('acme', 'acme')).toThrow('Dependency acme -> acme would create a cycle');
    expect(graph.childrenOf('acme/ax1/uart')).toEqual(['artifact:acme/ax1/uart_hal.hpp']);
  });

  it('removes a node and every edge into it', () => {
    const graph = hierarchy();
    graph.removeNode('acme/ax1/timer');

    expect(graph.has('acme/ax1/timer')).toBe(false);
    expect(graph.childrenOf('acme/ax1')).toEqual(['acme/ax1/uart']);
  });
});
