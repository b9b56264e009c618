export const TYPES = {
  Config: Symbol.for('Config'),
  ILogger: Symbol.for('ILogger'),
  ILinearClient: Symbol.for('ILinearClient'),
  IGraphService: Symbol.for('IGraphService'),
  IRenderService: Symbol.for('IRenderService'),
  IDependencyService: Symbol.for('IDependencyService'),
};
