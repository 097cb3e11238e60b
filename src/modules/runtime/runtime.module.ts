import { Module } from '@nestjs/common';
import { ConfigModule } from '../../infra/config/config.module';
import { RUNTIME_CONFIG, RuntimeConfig } from '../../infra/config/env.config';
import { CONTAINER_RUNTIME, ContainerRuntime } from './container-runtime.port';
import { DockerContainerRuntime } from './docker-container-runtime';
import { InMemoryContainerRuntime } from './inmemory-container-runtime';

/**
 * Container runtime module. CONTAINER_RUNTIME=inmemory selects the in-process driver;
 * anything else talks to Docker over DOCKER_SOCKET.
 */
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: CONTAINER_RUNTIME,
      useFactory: (config: RuntimeConfig): ContainerRuntime =>
        config.driver === 'inmemory' ? new InMemoryContainerRuntime() : new DockerContainerRuntime(config),
      inject: [RUNTIME_CONFIG],
    },
  ],
  exports: [CONTAINER_RUNTIME],
})
export class RuntimeModule {}
