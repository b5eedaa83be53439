import helmet from "helmet";

/**
 * Production security headers (the API serves JSON only)
 */
export const productionSecurityHeaders = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },

  // Prevent clickjacking attacks
  frameguard: {
    action: "deny",
  },

  noSniff: true,

  // Force HTTPS in production
  hsts: {
    maxAge: 31536000, // 1 year
    includeSubDomains: true,
    preload: true,
  },

  hidePoweredBy: true,

  referrerPolicy: {
    policy: "strict-origin-when-cross-origin",
  },

  dnsPrefetchControl: {
    allow: false,
  },

  crossOriginEmbedderPolicy: false,

  crossOriginResourcePolicy: {
    policy: "cross-origin", // CORS decides who may read responses
  },
});

/**
 * Development security headers configuration (more permissive)
 */
export const developmentSecurityHeaders = helmet({
  contentSecurityPolicy: false,
  frameguard: {
    action: "sameorigin",
  },
  noSniff: true,
  hsts: false, // No HTTPS enforcement in development
  hidePoweredBy: true,
  referrerPolicy: {
    policy: "no-referrer-when-downgrade",
  },
  crossOriginEmbedderPolicy: false,
  crossOriginResourcePolicy: {
    policy: "cross-origin",
  },
});

export const getSecurityHeaders = (isProduction: boolean) => {
  if (isProduction) {
    console.log("🔒 [SECURITY] Using PRODUCTION security headers (strict)");
    return productionSecurityHeaders;
  }
  console.log("🔓 [SECURITY] Using DEVELOPMENT security headers (permissive)");
  return developmentSecurityHeaders;
};
