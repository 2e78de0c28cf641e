import { gql } from 'graphql-request';

/**
 * Resolve the user owning the access token
 */
export const CURRENT_USER = gql`
  query CurrentUser {
    currentUser {
      username
      name
    }
  }
`;
