/**
 * Search Engines Index
 *
 * Registers all available engines with the global registry.
 * Import this module to ensure engines are registered before use.
 */

import { engineRegistry } from '../engine'
import { minimaxEngine } from './minimax-engine'
import { alphaBetaEngine } from './alphabeta-engine'

engineRegistry.register(minimaxEngine)
engineRegistry.register(alphaBetaEngine)

// Plain minimax is the default, as in the game manager's configuration
engineRegistry.setDefault('minimax')

export { minimaxEngine, alphaBetaEngine, engineRegistry }
