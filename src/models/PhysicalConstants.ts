export const EARTH_RADIUS_KM = 6371;
export const EARTH_MU = 398600.4418; // km³/s²
export const SPEED_OF_LIGHT_KM_S = 299792.458;
export const EARTH_ROTATION_RAD_S = 7.2921159e-5;

export const DEG_TO_RAD = Math.PI / 180;
export const RAD_TO_DEG = 180 / Math.PI;
