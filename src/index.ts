#!/usr/bin/env node
/**
 * zone-migrate - Entry Point
 *
 * Migrates a domain's DNS records from the GoDaddy API into
 * Terraform configuration for Google Cloud DNS
 */
import { run } from './cli/index.js';

run(process.argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
