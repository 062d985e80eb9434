import { defineConfig } from 'vitest/config'
import { join } from 'path'
import { tmpdir } from 'os'

export default defineConfig({
  test: {
    environment: 'node',
    env: {
      // 知识库文件写进临时目录，不碰工作区里的 .stepwise
      STEPWISE_DATA_DIR: join(tmpdir(), 'stepwise-test-data'),
    },
    include: ['src/**/__tests__/*.test.ts', 'tests/**/*.test.ts'],
    setupFiles: ['./tests/setup.ts'],
    // 共享同一个数据目录，文件之间串行
    fileParallelism: false,
    testTimeout: 10000,
  },
})
