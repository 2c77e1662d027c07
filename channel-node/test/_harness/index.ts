export { MemoryTransport } from './memory-transport.js'
export {
  type ListeningServer,
  listenServer,
  scriptedPeer,
  type ServerHarness,
  type ServerHarnessOptions,
  startServer,
  TextCollector
} from './server.js'
export { FakeFileStore, FakeSampleStore, patternBytes } from './stores.js'
