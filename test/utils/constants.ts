export const API_PREFIX = 'api';
export const HOSPITALS_URL = `/${API_PREFIX}/hospitals`;
