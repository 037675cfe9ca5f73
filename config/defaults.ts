export const DEFAULT_CONFIG = {
  jobs: {
    container: 'login',
    dockerCommand: 'docker',
    quantumPartition: 'quantum',
    indicatorPins: '17,27',
    matrixBrightness: 0.5,
    matrixLayout: 'serpentine-rows',
    intervalSeconds: 30,
    queryTimeoutSeconds: 30
  },
  nodes: {
    host: '192.168.4.160',
    user: 'monitor',
    container: 'login',
    dockerCommand: 'docker',
    nodePins: 'c1=17,c2=27,c3=22,c4=23,q1=24,q2=25',
    connectTimeoutSeconds: 5,
    remoteTimeoutSeconds: 10,
    intervalSeconds: 5
  },
  matrix: {
    width: 24,
    height: 8,
    startupTimeoutMs: 5000
  },
  gpio: {
    base: 0
  }
} as const;

export type ClusterLightsDefaults = typeof DEFAULT_CONFIG;
