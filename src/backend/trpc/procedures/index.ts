export { authedProcedure, roleProcedure } from './authenticated';
