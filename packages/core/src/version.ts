/** Version reported in the User-Agent of outgoing discovery requests */
export const PACKAGE_VERSION = '0.1.0';
