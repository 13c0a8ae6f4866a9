// src/core/config/graphql.config.ts

const graphqlConfig = () => {
  const isProd = process.env.NODE_ENV === 'production';
  return {
    graphql: {
      path: process.env.GRAPHQL_PATH || '/graphql',
      schemaDestination: 'src/schema.graphql',
      introspection: !isProd,
      includeStacktrace: !isProd,
      sortSchema: true,
    },
  };
};

export default graphqlConfig;
