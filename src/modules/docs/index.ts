import openapi from '@elysiajs/openapi'

export const docs = openapi({
  path: '/docs',
  documentation: {
    info: {
      title: 'GenAds API',
      version: process.env.SERVICE_VERSION ?? '1.0.0',
      description:
        'Signup and signin, video job records, dashboard summaries and file staging.',
    },
    tags: [
      { name: 'Health', description: 'Liveness and database diagnostics' },
      { name: 'Auth', description: 'Account creation and signin' },
      { name: 'Video Jobs', description: 'Video job records and dashboard' },
      { name: 'Uploads', description: 'File staging' },
    ],
  },
})
