import { Container } from 'inversify';
import { DependencyService, type IDependencyService } from './dependencies.js';
import { GraphService, type IGraphService } from './graph.js';
import { LinearClient, type ILinearClient } from './linear.js';
import { ConsoleLogger, toLogLevel, type ILogger } from './logger.js';
import { RenderService, type IRenderService } from './render.js';
import { TYPES } from './tokens.js';
import type { LinearConfig } from './types.js';

export { TYPES } from './tokens.js';

export function createContainer(config: LinearConfig, logger?: ILogger): Container {
  const container = new Container();
  container.bind<LinearConfig>(TYPES.Config).toConstantValue(config);
  container.bind<ILogger>(TYPES.ILogger).toConstantValue(logger ?? new ConsoleLogger(toLogLevel(config.logLevel)));
  container.bind<ILinearClient>(TYPES.ILinearClient).to(LinearClient).inSingletonScope();
  container.bind<IGraphService>(TYPES.IGraphService).to(GraphService).inSingletonScope();
  container.bind<IRenderService>(TYPES.IRenderService).to(RenderService).inSingletonScope();
  container.bind<IDependencyService>(TYPES.IDependencyService).to(DependencyService).inSingletonScope();
  return container;
}
